import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { cryptoRandomId } from '../crypto';
import { parseOrReply } from '../http';
import { log } from '../log';
import { PlayerRegistry } from './state';

const registerSchema = z.object({
    playerId: z.string().trim().min(1).max(64),
});

export function createPlayerRouter(players: PlayerRegistry): Router {
    const router = Router();

    /**
     * @route POST /player/register
     * Registers a new player and returns a secret key for them.
     * The key is only ever sent in this response.
     */
    router.post('/register', (req: Request, res: Response) => {
        const body = parseOrReply(registerSchema, req.body, res);
        if (!body) return;
        const { playerId } = body;

        if (players.playerExists(playerId)) {
            res.status(409).json({ error: 'Player with this ID already exists' });
            return;
        }

        const key = `sk_` + cryptoRandomId();
        players.createPlayer(playerId, key);
        log('info', 'player', 'registered', { playerId });

        res.status(201).json({ playerId, key });
    });

    return router;
}
