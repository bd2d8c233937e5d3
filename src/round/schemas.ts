import { z } from 'zod';
import { ANSWER_COUNT } from '../crypto';
import { MAX_DISPLAY_NAME_BYTES } from './names';

const hash = z.string().regex(/^[0-9a-fA-F]{64}$/, 'expected a 32-byte hex value').transform(value => value.toLowerCase());
const amount = z.number().int().safe().min(0);
const displayName = z.string().max(MAX_DISPLAY_NAME_BYTES);

const windowSeconds = z
    .object({
        minRevealDelaySeconds: z.number().int().min(0),
        maxRevealDelaySeconds: z.number().int().min(1),
    })
    .refine(w => w.minRevealDelaySeconds < w.maxRevealDelaySeconds, {
        message: 'minRevealDelaySeconds must be below maxRevealDelaySeconds',
    });

export const startRoundSchema = z
    .object({
        entryFee: amount,
        prizeAmount: amount,
        salt: hash.optional(),
        answerHashes: z.array(hash).length(ANSWER_COUNT).optional(),
        answers: z.array(z.string()).length(ANSWER_COUNT).optional(),
        window: windowSeconds.optional(),
    })
    .refine(body => (body.answerHashes === undefined) !== (body.answers === undefined), {
        message: 'provide either answerHashes or answers',
    })
    .refine(body => body.answerHashes === undefined || body.salt !== undefined, {
        message: 'salt is required with answerHashes',
    });

export const updateAnswersSchema = z.object({
    answerHashes: z.array(hash).length(ANSWER_COUNT),
});

export const updateEconomicsSchema = z
    .object({
        entryFee: amount,
        prizeAmount: amount,
    })
    .and(windowSeconds);

export const fundSchema = z.object({
    amount: z.number().int().safe(),
});

export const withdrawSchema = z.object({
    to: z.string(),
    amount: z.number().int().safe(),
});

export const banSchema = z.object({
    banned: z.boolean(),
});

export const metadataSchema = z
    .object({
        lossImage: z.string().min(1),
        winImage: z.string().min(1),
        pendingImage: z.string().min(1),
        externalUrl: z.string().url(),
    })
    .partial();

export const cancelSchema = z.object({
    batchSize: z.number().int().min(1).optional(),
});

export const commitSchema = z.object({
    commitHash: hash,
    displayName,
});

export const revealSchema = z.object({
    answers: z.array(z.string()).length(ANSWER_COUNT),
    revealSalt: hash,
    displayName: displayName.optional(),
});

export const roundIdParam = z.coerce.number().int().min(1);

export const pageQuerySchema = z.object({
    offset: z.coerce.number().int().min(0).default(0),
    limit: z.coerce.number().int().min(0).default(50),
});
