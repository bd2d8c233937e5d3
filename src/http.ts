import { Response } from 'express';
import { z } from 'zod';
import { isRoundError } from './errors';
import { log } from './log';

/**
 * Parses a request payload, replying 400 with the validation issues on failure.
 * @returns The parsed value, or null once a reply has been sent.
 */
export function parseOrReply<T extends z.ZodTypeAny>(schema: T, input: unknown, res: Response): z.infer<T> | null {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        res.status(400).json({ error: 'invalid request', code: 'InvalidRequest', issues: parsed.error.issues });
        return null;
    }
    return parsed.data;
}

/**
 * Maps a thrown error onto a JSON response. Round errors keep their code and
 * status; anything else is logged and reported as an internal error.
 */
export function sendError(res: Response, err: unknown, context: string): void {
    if (isRoundError(err)) {
        log(err.level, 'http', 'request_failed', { context, code: err.code, message: err.message });
        res.status(err.status).json({ error: err.message, code: err.code });
        return;
    }
    log('error', 'http', 'unexpected_error', { context, error: err instanceof Error ? err.message : String(err) });
    res.status(500).json({ error: 'internal error', code: 'InternalError' });
}

/**
 * Runs a handler body and turns any thrown error into a response.
 */
export function respond<T>(res: Response, context: string, status: number, fn: () => T): void {
    try {
        const body = fn();
        res.status(status).json(body);
    } catch (err) {
        sendError(res, err, context);
    }
}

