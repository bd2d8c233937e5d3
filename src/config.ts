import 'dotenv/config';
import { z } from 'zod';
import { LogLevel } from './log';
import { DisplayNamePolicy } from './round/names';
import { TokenIdSchemeName } from './tokens/scheme';

// This module is responsible for loading and validating environment variables.
// Startup fails if a critical variable is missing or malformed.

const flag = z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform(value => value === 'true' || value === '1');

const envSchema = z
    .object({
        PORT: z.coerce.number().int().min(1).max(65535).default(3000),
        ADMIN_ID: z.string().min(1).default('admin'),
        ADMIN_KEY: z.string({ required_error: 'ADMIN_KEY environment variable is not set. Please create a .env file.' }).min(8),
        MIN_REVEAL_DELAY_SECONDS: z.coerce.number().int().min(0).default(60),
        MAX_REVEAL_DELAY_SECONDS: z.coerce.number().int().min(1).default(86_400),
        TOKEN_ID_SCHEME: z.enum(['static', 'per-round', 'round-id']).default('static'),
        LOSS_TOKEN_BASE: z.coerce.number().int().min(0).default(1_000_000),
        WIN_TOKEN_BASE: z.coerce.number().int().min(1).default(2_000_000),
        DISPLAY_NAME_POLICY: z.enum(['strict', 'length']).default('strict'),
        CANCEL_BATCH_SIZE: z.coerce.number().int().min(1).default(100),
        MAX_PAGE_SIZE: z.coerce.number().int().min(1).default(100),
        ENABLE_DEV_MINT: flag,
        LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .refine(env => env.MIN_REVEAL_DELAY_SECONDS < env.MAX_REVEAL_DELAY_SECONDS, {
        message: 'MIN_REVEAL_DELAY_SECONDS must be below MAX_REVEAL_DELAY_SECONDS',
        path: ['MIN_REVEAL_DELAY_SECONDS'],
    })
    .refine(env => env.TOKEN_ID_SCHEME !== 'per-round' || env.LOSS_TOKEN_BASE < env.WIN_TOKEN_BASE, {
        message: 'LOSS_TOKEN_BASE must be below WIN_TOKEN_BASE',
        path: ['LOSS_TOKEN_BASE'],
    });

export type AppConfig = {
    port: number;
    adminId: string;
    adminKey: string;
    minRevealDelayMs: number;
    maxRevealDelayMs: number;
    tokenIdScheme: TokenIdSchemeName;
    lossTokenBase: number;
    winTokenBase: number;
    displayNamePolicy: DisplayNamePolicy;
    cancelBatchSize: number;
    maxPageSize: number;
    enableDevMint: boolean;
    logLevel: LogLevel;
};

/**
 * Validates an environment map into the application configuration.
 * @throws Error listing every invalid variable.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid configuration: ${issues.join('; ')}`);
    }
    const e = parsed.data;
    return {
        port: e.PORT,
        adminId: e.ADMIN_ID,
        adminKey: e.ADMIN_KEY,
        minRevealDelayMs: e.MIN_REVEAL_DELAY_SECONDS * 1000,
        maxRevealDelayMs: e.MAX_REVEAL_DELAY_SECONDS * 1000,
        tokenIdScheme: e.TOKEN_ID_SCHEME,
        lossTokenBase: e.LOSS_TOKEN_BASE,
        winTokenBase: e.WIN_TOKEN_BASE,
        displayNamePolicy: e.DISPLAY_NAME_POLICY,
        cancelBatchSize: e.CANCEL_BATCH_SIZE,
        maxPageSize: e.MAX_PAGE_SIZE,
        enableDevMint: e.ENABLE_DEV_MINT,
        logLevel: e.LOG_LEVEL,
    };
}

export function loadConfig(): AppConfig {
    return parseConfig(process.env);
}
