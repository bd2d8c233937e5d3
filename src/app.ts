import express, { Express } from 'express';
import { AppConfig } from './config';
import { PlayerRegistry } from './player/state';
import { createPlayerRouter } from './player/routes';
import { RoundEngine } from './round/engine';
import { createRoundRouter } from './round/routes';
import { createAdminRouter } from './round/admin-routes';
import { createScheme } from './tokens/scheme';
import { TokenLedger } from './tokens/state';
import { createTokenRouter } from './tokens/routes';
import { Wallet } from './wallet/state';
import { createWalletRouter } from './wallet/routes';

export type Services = {
    engine: RoundEngine;
    players: PlayerRegistry;
    wallet: Wallet;
    tokens: TokenLedger;
};

/**
 * Wires the in-memory collaborators into a round engine. The administrator
 * is registered as a player holding the configured key.
 */
export function createServices(config: AppConfig, now?: () => number): Services {
    const players = new PlayerRegistry();
    const wallet = new Wallet();
    const tokens = new TokenLedger();
    players.createPlayer(config.adminId, config.adminKey);
    const engine = new RoundEngine({
        adminId: config.adminId,
        escrow: wallet.escrow(),
        issuer: tokens,
        scheme: createScheme(config.tokenIdScheme, config.lossTokenBase, config.winTokenBase),
        defaultWindow: { minRevealDelay: config.minRevealDelayMs, maxRevealDelay: config.maxRevealDelayMs },
        displayNamePolicy: config.displayNamePolicy,
        cancelBatchSize: config.cancelBatchSize,
        maxPageSize: config.maxPageSize,
        now,
    });
    return { engine, players, wallet, tokens };
}

export function createApp(config: AppConfig, services: Services): Express {
    const app = express();
    // Middleware to parse JSON bodies.
    app.use(express.json({ limit: '1mb' }));

    // A simple health check endpoint.
    app.get('/health', (_req, res) => {
        res.status(200).json({ ok: true, currentRound: services.engine.currentRound });
    });

    app.use('/player', createPlayerRouter(services.players));
    app.use('/wallet', createWalletRouter(services.wallet, { enableDevMint: config.enableDevMint }));
    app.use('/rounds', createRoundRouter(services.engine, services.players));
    app.use('/admin', createAdminRouter(services.engine, services.players));
    app.use('/tokens', createTokenRouter(services.engine, services.tokens));

    return app;
}
