import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { parseOrReply, respond } from '../http';
import { RoundEngine } from '../round/engine';
import { TokenLedger } from './state';

const tokenIdParam = z.coerce.number().int().min(0);

export function createTokenRouter(engine: RoundEngine, ledger: TokenLedger): Router {
    const router = Router();

    /**
     * @route GET /tokens/owners/:playerId
     * Outcome tokens held by a player.
     */
    router.get('/owners/:playerId', (req: Request, res: Response) => {
        const { playerId } = req.params;
        res.status(200).json({ playerId, tokens: ledger.holdings(playerId) });
    });

    /**
     * @route GET /tokens/:tokenId/metadata
     * Descriptor of an outcome token.
     */
    router.get('/:tokenId/metadata', (req: Request, res: Response) => {
        const tokenId = parseOrReply(tokenIdParam, req.params.tokenId, res);
        if (tokenId === null) return;
        respond(res, 'tokenMetadata', 200, () => engine.tokenMetadata(tokenId));
    });

    return router;
}
