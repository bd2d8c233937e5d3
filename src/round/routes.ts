import { Router, Request, Response } from 'express';
import { parseOrReply, respond } from '../http';
import { callerOf, requirePlayer } from '../player/auth';
import { PlayerRegistry } from '../player/state';
import { RoundEngine } from './engine';
import { commitSchema, pageQuerySchema, revealSchema, roundIdParam } from './schemas';

/**
 * Participant, permissionless and query routes for rounds.
 */
export function createRoundRouter(engine: RoundEngine, players: PlayerRegistry): Router {
    const router = Router();
    const authenticated = requirePlayer(players);

    /**
     * @route GET /rounds/current
     * Status of the latest round.
     */
    router.get('/current', (_req: Request, res: Response) => {
        const status = engine.currentStatus();
        if (!status) {
            res.status(404).json({ error: 'no round started' });
            return;
        }
        res.status(200).json(status);
    });

    /**
     * @route POST /rounds/current/commit
     * Submits a hidden answer commitment and pays the entry fee.
     */
    router.post('/current/commit', authenticated, (req: Request, res: Response) => {
        const body = parseOrReply(commitSchema, req.body, res);
        if (!body) return;
        respond(res, 'commit', 201, () => engine.commit(callerOf(res), body.commitHash, body.displayName));
    });

    /**
     * @route POST /rounds/current/reveal
     * Reveals answers for the caller's commitment and resolves it.
     */
    router.post('/current/reveal', authenticated, (req: Request, res: Response) => {
        const body = parseOrReply(revealSchema, req.body, res);
        if (!body) return;
        respond(res, 'reveal', 200, () => engine.reveal(callerOf(res), body.answers, body.revealSalt, body.displayName));
    });

    router.get('/:id', (req: Request, res: Response) => {
        const roundId = parseOrReply(roundIdParam, req.params.id, res);
        if (roundId === null) return;
        respond(res, 'status', 200, () => engine.status(roundId));
    });

    router.get('/:id/commits/:playerId', (req: Request, res: Response) => {
        const roundId = parseOrReply(roundIdParam, req.params.id, res);
        if (roundId === null) return;
        respond(res, 'commitStatus', 200, () => engine.commitStatus(roundId, req.params.playerId));
    });

    /**
     * @route DELETE /rounds/:id/commits/:playerId
     * Anyone may purge an expired, unrevealed commitment. The fee is not refunded.
     */
    router.delete('/:id/commits/:playerId', (req: Request, res: Response) => {
        const roundId = parseOrReply(roundIdParam, req.params.id, res);
        if (roundId === null) return;
        const { playerId } = req.params;
        respond(res, 'clearExpiredCommit', 200, () => {
            engine.clearExpiredCommit(roundId, playerId);
            return { roundId, playerId, cleared: true };
        });
    });

    /**
     * @route GET /rounds/:id/players?offset=&limit=
     * Bounded page of the players who committed in a round.
     */
    router.get('/:id/players', (req: Request, res: Response) => {
        const roundId = parseOrReply(roundIdParam, req.params.id, res);
        if (roundId === null) return;
        const query = parseOrReply(pageQuerySchema, req.query, res);
        if (!query) return;
        respond(res, 'listPlayers', 200, () => engine.listPlayers(roundId, query.offset, query.limit));
    });

    return router;
}
