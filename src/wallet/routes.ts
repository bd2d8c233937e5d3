import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { parseOrReply } from '../http';
import { Wallet } from './state';

const mintSchema = z.object({
    playerId: z.string().min(1),
    amount: z.number().int().safe().positive(),
});

export function createWalletRouter(wallet: Wallet, options: { enableDevMint: boolean }): Router {
    const router = Router();

    /**
     * @route GET /wallet/custody
     * Funds currently held in escrow.
     */
    router.get('/custody', (_req: Request, res: Response) => {
        res.status(200).json({ balance: wallet.getCustodyBalance() });
    });

    /**
     * @route GET /wallet/:playerId/balance
     * Retrieves the current balance for a given player.
     */
    router.get('/:playerId/balance', (req: Request, res: Response) => {
        const { playerId } = req.params;
        res.status(200).json({ playerId, balance: wallet.getBalance(playerId) });
    });

    /**
     * @route POST /wallet/mint
     * Credits a player's wallet. Development only, disabled unless ENABLE_DEV_MINT is set.
     */
    router.post('/mint', (req: Request, res: Response) => {
        if (!options.enableDevMint) {
            res.status(404).json({ error: 'not found' });
            return;
        }
        const body = parseOrReply(mintSchema, req.body, res);
        if (!body) return;
        const newBalance = wallet.addToBalance(body.playerId, body.amount);
        res.status(200).json({ playerId: body.playerId, newBalance });
    });

    return router;
}
