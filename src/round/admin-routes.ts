import { Router, Request, Response } from 'express';
import { hashAnswers, randomSalt } from '../crypto';
import { parseOrReply, respond } from '../http';
import { callerOf, requirePlayer } from '../player/auth';
import { PlayerRegistry } from '../player/state';
import { RoundEngine } from './engine';
import {
    banSchema,
    cancelSchema,
    fundSchema,
    metadataSchema,
    roundIdParam,
    startRoundSchema,
    updateAnswersSchema,
    updateEconomicsSchema,
    withdrawSchema,
} from './schemas';

const seconds = (value: number): number => value * 1000;

/**
 * Administrative routes. Every route authenticates the caller; the engine
 * rejects anyone but the configured administrator.
 */
export function createAdminRouter(engine: RoundEngine, players: PlayerRegistry): Router {
    const router = Router();
    router.use(requirePlayer(players));

    /**
     * @route POST /admin/rounds
     * Starts a new round. Accepts either salted answer hashes with their salt,
     * or plaintext answers which are hashed here and never stored.
     */
    router.post('/rounds', (req: Request, res: Response) => {
        const body = parseOrReply(startRoundSchema, req.body, res);
        if (!body) return;
        const salt = body.salt ?? randomSalt();
        const answerHashes = body.answerHashes ?? hashAnswers(salt, body.answers ?? []);
        const window = body.window && {
            minRevealDelay: seconds(body.window.minRevealDelaySeconds),
            maxRevealDelay: seconds(body.window.maxRevealDelaySeconds),
        };
        respond(res, 'startRound', 201, () => ({
            ...engine.startRound(callerOf(res), {
                entryFee: body.entryFee,
                prizeAmount: body.prizeAmount,
                salt,
                answerHashes,
                window,
            }),
            salt,
        }));
    });

    router.put('/rounds/current/answers', (req: Request, res: Response) => {
        const body = parseOrReply(updateAnswersSchema, req.body, res);
        if (!body) return;
        respond(res, 'updateAnswers', 200, () => {
            engine.updateAnswers(callerOf(res), body.answerHashes);
            return { updated: true };
        });
    });

    router.put('/rounds/current/economics', (req: Request, res: Response) => {
        const body = parseOrReply(updateEconomicsSchema, req.body, res);
        if (!body) return;
        respond(res, 'updateEconomics', 200, () =>
            engine.updateEconomics(callerOf(res), {
                entryFee: body.entryFee,
                prizeAmount: body.prizeAmount,
                minRevealDelay: seconds(body.minRevealDelaySeconds),
                maxRevealDelay: seconds(body.maxRevealDelaySeconds),
            }),
        );
    });

    /**
     * @route POST /admin/rounds/:id/fund
     * Moves prize money from the administrator's wallet into escrow.
     */
    router.post('/rounds/:id/fund', (req: Request, res: Response) => {
        const roundId = parseOrReply(roundIdParam, req.params.id, res);
        if (roundId === null) return;
        const body = parseOrReply(fundSchema, req.body, res);
        if (!body) return;
        respond(res, 'fundPrize', 200, () => engine.fundPrize(callerOf(res), roundId, body.amount));
    });

    router.post('/withdraw', (req: Request, res: Response) => {
        const body = parseOrReply(withdrawSchema, req.body, res);
        if (!body) return;
        respond(res, 'withdraw', 200, () => {
            engine.withdraw(callerOf(res), body.to, body.amount);
            return { to: body.to, amount: body.amount };
        });
    });

    /**
     * @route POST /admin/rounds/current/cancel
     * Cancels the current round and issues loss tokens to the first batch of
     * unrevealed committers. Continue with /rounds/:id/cancel/resume until done.
     */
    router.post('/rounds/current/cancel', (req: Request, res: Response) => {
        const body = parseOrReply(cancelSchema, req.body ?? {}, res);
        if (!body) return;
        respond(res, 'cancelCurrentRound', 200, () => engine.cancelCurrentRound(callerOf(res), body.batchSize));
    });

    router.post('/rounds/:id/cancel/resume', (req: Request, res: Response) => {
        const roundId = parseOrReply(roundIdParam, req.params.id, res);
        if (roundId === null) return;
        const body = parseOrReply(cancelSchema, req.body ?? {}, res);
        if (!body) return;
        respond(res, 'resumeCancellation', 200, () => engine.resumeCancellation(callerOf(res), roundId, body.batchSize));
    });

    router.put('/bans/:playerId', (req: Request, res: Response) => {
        const body = parseOrReply(banSchema, req.body, res);
        if (!body) return;
        const { playerId } = req.params;
        respond(res, 'setBanned', 200, () => {
            engine.setBanned(callerOf(res), playerId, body.banned);
            return { playerId, banned: body.banned };
        });
    });

    router.put('/metadata', (req: Request, res: Response) => {
        const body = parseOrReply(metadataSchema, req.body, res);
        if (!body) return;
        respond(res, 'setMetadataSources', 200, () => engine.setMetadataSources(callerOf(res), body));
    });

    return router;
}
