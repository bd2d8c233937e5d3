import { computeCommitment, hashAnswers } from '../src/crypto';
import { RoundErrorCode } from '../src/errors';
import { setLogLevel } from '../src/log';
import { EngineOptions, RoundEngine } from '../src/round/engine';
import { RoundStatus, StartRoundParams } from '../src/round/types';
import { staticScheme } from '../src/tokens/scheme';
import { TokenLedger } from '../src/tokens/state';
import { Wallet } from '../src/wallet/state';

setLogLevel('error');

export const ADMIN = 'admin';
export const ANSWERS = ['A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I', 'J'];
export const WRONG_ANSWERS = ['A', 'B', 'C', 'X', 'E', 'F', 'G', 'H', 'I', 'J'];
export const ROUND_SALT = '11'.repeat(32);
export const REVEAL_SALT = '22'.repeat(32);
export const MIN_DELAY = 60_000;
export const MAX_DELAY = 3_600_000;
export const START_TIME = 1_700_000_000_000;

export function setup(overrides: Partial<EngineOptions> = {}) {
    let clock = START_TIME;
    const wallet = new Wallet();
    const tokens = new TokenLedger();
    const engine = new RoundEngine({
        adminId: ADMIN,
        escrow: wallet.escrow(),
        issuer: tokens,
        scheme: staticScheme(),
        defaultWindow: { minRevealDelay: MIN_DELAY, maxRevealDelay: MAX_DELAY },
        displayNamePolicy: 'strict',
        cancelBatchSize: 100,
        maxPageSize: 100,
        now: () => clock,
        ...overrides,
    });
    return {
        engine,
        wallet,
        tokens,
        advance: (ms: number) => {
            clock += ms;
        },
    };
}

export function startDefaultRound(engine: RoundEngine, overrides: Partial<StartRoundParams> = {}): RoundStatus {
    return engine.startRound(ADMIN, {
        entryFee: 1,
        prizeAmount: 100,
        salt: ROUND_SALT,
        answerHashes: hashAnswers(ROUND_SALT, ANSWERS),
        ...overrides,
    });
}

export function commitFor(
    engine: RoundEngine,
    playerId: string,
    answers: string[] = ANSWERS,
    displayName = 'Player One',
    revealSalt = REVEAL_SALT,
) {
    return engine.commit(playerId, computeCommitment(playerId, displayName, answers, revealSalt), displayName);
}

export function expectCode(fn: () => unknown, code: RoundErrorCode): void {
    let caught: unknown;
    try {
        fn();
    } catch (err) {
        caught = err;
    }
    expect(caught).toMatchObject({ name: 'RoundError', code });
}
