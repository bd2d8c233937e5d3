import { NextFunction, Request, Response } from 'express';
import { RoundError } from '../errors';
import { sendError } from '../http';
import { PlayerRegistry } from './state';

/**
 * Resolves the bearer key of a request to a player id.
 * @throws RoundError Unauthenticated for a missing header or an unknown key.
 */
export function authenticate(players: PlayerRegistry, authHeader: string | undefined): string {
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
        throw new RoundError('Unauthenticated');
    }
    const key = authHeader.slice('Bearer '.length).trim();
    const playerId = key ? players.getPlayerIdByKey(key) : undefined;
    if (!playerId) {
        throw new RoundError('Unauthenticated', 'Invalid authentication key');
    }
    return playerId;
}

/**
 * Express middleware storing the authenticated player id in `res.locals.playerId`.
 */
export function requirePlayer(players: PlayerRegistry) {
    return (req: Request, res: Response, next: NextFunction): void => {
        try {
            res.locals.playerId = authenticate(players, req.headers.authorization);
            next();
        } catch (err) {
            sendError(res, err, 'auth');
        }
    };
}

/**
 * Reads the id stored by `requirePlayer`.
 */
export function callerOf(res: Response): string {
    const playerId: unknown = res.locals.playerId;
    return typeof playerId === 'string' ? playerId : '';
}
