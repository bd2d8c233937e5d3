export type TokenIdSchemeName = 'static' | 'per-round' | 'round-id';

export type TokenOutcome = { kind: 'loss'; roundId?: number } | { kind: 'win'; roundId?: number };

/**
 * Maps round outcomes to outcome-token ids and back.
 */
export interface TokenIdScheme {
    readonly name: TokenIdSchemeName;
    /** Highest round id whose token ids stay unambiguous. */
    readonly maxRoundId: number;
    lossId(roundId: number): number;
    winId(roundId: number): number;
    /** Undefined for an id the scheme never issues. */
    decode(tokenId: number): TokenOutcome | undefined;
}

export const STATIC_LOSS_ID = 0;
export const STATIC_WIN_ID = 1;

/** Fixed loss id 0 and win id 1, reused across every round. */
export function staticScheme(): TokenIdScheme {
    return {
        name: 'static',
        maxRoundId: Number.MAX_SAFE_INTEGER,
        lossId: () => STATIC_LOSS_ID,
        winId: () => STATIC_WIN_ID,
        decode: tokenId => {
            if (tokenId === STATIC_LOSS_ID) return { kind: 'loss' };
            if (tokenId === STATIC_WIN_ID) return { kind: 'win' };
            return undefined;
        },
    };
}

/**
 * Loss and win ids offset by the round id from separate bases.
 * Round ids stop at `winBase - lossBase - 1`; beyond that a loss id would
 * land in the win range.
 */
export function perRoundScheme(lossBase: number, winBase: number): TokenIdScheme {
    if (winBase <= lossBase) {
        throw new Error('win token base must be greater than loss token base');
    }
    return {
        name: 'per-round',
        maxRoundId: Math.min(winBase - lossBase - 1, Number.MAX_SAFE_INTEGER - winBase),
        lossId: roundId => lossBase + roundId,
        winId: roundId => winBase + roundId,
        decode: tokenId => {
            if (!Number.isInteger(tokenId)) return undefined;
            if (tokenId > winBase) return { kind: 'win', roundId: tokenId - winBase };
            if (tokenId > lossBase && tokenId < winBase) return { kind: 'loss', roundId: tokenId - lossBase };
            return undefined;
        },
    };
}

/** The win id is the round id itself; losses share id 0. */
export function roundIdScheme(): TokenIdScheme {
    return {
        name: 'round-id',
        maxRoundId: Number.MAX_SAFE_INTEGER,
        lossId: () => 0,
        winId: roundId => roundId,
        decode: tokenId => {
            if (tokenId === 0) return { kind: 'loss' };
            if (Number.isInteger(tokenId) && tokenId > 0) return { kind: 'win', roundId: tokenId };
            return undefined;
        },
    };
}

export function createScheme(name: TokenIdSchemeName, lossBase: number, winBase: number): TokenIdScheme {
    switch (name) {
        case 'static':
            return staticScheme();
        case 'per-round':
            return perRoundScheme(lossBase, winBase);
        case 'round-id':
            return roundIdScheme();
    }
}
