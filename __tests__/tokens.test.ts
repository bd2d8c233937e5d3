import { DEFAULT_METADATA_SOURCES, RoundLookup, renderMetadata } from '../src/tokens/metadata';
import { createScheme, perRoundScheme, roundIdScheme, staticScheme } from '../src/tokens/scheme';
import { TokenLedger } from '../src/tokens/state';
import { Round } from '../src/round/types';
import { ADMIN, ANSWERS, MIN_DELAY, REVEAL_SALT, commitFor, expectCode, setup, startDefaultRound } from './helpers';

function round(id: number, overrides: Partial<Round> = {}): Round {
    return {
        id,
        startedAt: 0,
        entryFee: 1,
        prizeAmount: 100,
        answerSalt: '11'.repeat(32),
        correctAnswerHashes: [],
        minRevealDelay: 0,
        maxRevealDelay: 1,
        prizeFunded: 0,
        won: false,
        cancelled: false,
        cancelCursor: 0,
        ...overrides,
    };
}

function lookup(rounds: Round[]): RoundLookup {
    return {
        currentRound: rounds.length,
        getRound: id => rounds.find(r => r.id === id),
    };
}

describe('token id schemes', () => {
    it('static reuses ids 0 and 1', () => {
        const scheme = staticScheme();
        expect([scheme.lossId(7), scheme.winId(7)]).toEqual([0, 1]);
        expect(scheme.decode(1)).toEqual({ kind: 'win' });
        expect(scheme.decode(2)).toBeUndefined();
    });

    it('per-round offsets both outcomes', () => {
        const scheme = perRoundScheme(1000, 2000);
        expect([scheme.lossId(3), scheme.winId(3)]).toEqual([1003, 2003]);
        expect(scheme.decode(1003)).toEqual({ kind: 'loss', roundId: 3 });
        expect(scheme.decode(2003)).toEqual({ kind: 'win', roundId: 3 });
        expect(scheme.decode(1000)).toBeUndefined();
        expect(scheme.decode(2000)).toBeUndefined();
        expect(() => perRoundScheme(2000, 1000)).toThrow('win token base must be greater than loss token base');
    });

    it('per-round stops before loss ids reach the win range', () => {
        const scheme = perRoundScheme(1000, 2000);
        expect(scheme.maxRoundId).toBe(999);
        expect(scheme.decode(scheme.lossId(999))).toEqual({ kind: 'loss', roundId: 999 });
        expect(staticScheme().maxRoundId).toBe(Number.MAX_SAFE_INTEGER);
    });

    it('refuses to start a round past the scheme limit', () => {
        const { engine } = setup({ scheme: perRoundScheme(10, 12) });
        startDefaultRound(engine);
        engine.cancelCurrentRound(ADMIN);

        expectCode(() => startDefaultRound(engine), 'RoundLimitReached');
        expect(engine.currentRound).toBe(1);
    });

    it('round-id uses the round as the win id', () => {
        const scheme = roundIdScheme();
        expect([scheme.lossId(4), scheme.winId(4)]).toEqual([0, 4]);
        expect(scheme.decode(4)).toEqual({ kind: 'win', roundId: 4 });
        expect(scheme.decode(-1)).toBeUndefined();
    });

    it('is selected by name', () => {
        expect(createScheme('round-id', 0, 1).name).toBe('round-id');
        expect(createScheme('per-round', 10, 20).winId(1)).toBe(21);
    });
});

describe('TokenLedger', () => {
    it('tracks balances and supply', () => {
        const ledger = new TokenLedger();
        expect(ledger.mint('alice', 0)).toBe(true);
        expect(ledger.mint('alice', 0)).toBe(true);
        expect(ledger.mint('alice', 5)).toBe(true);
        expect(ledger.holdings('alice')).toEqual([
            { tokenId: 0, amount: 2 },
            { tokenId: 5, amount: 1 },
        ]);
        expect(ledger.totalSupply(0)).toBe(2);

        expect(ledger.burn('alice', 5)).toBe(true);
        expect(ledger.burn('alice', 5)).toBe(false);
        expect(ledger.balanceOf('alice', 5)).toBe(0);
        expect(ledger.totalSupply(5)).toBe(0);
    });

    it('refuses invalid mints', () => {
        const ledger = new TokenLedger();
        expect(ledger.mint('', 0)).toBe(false);
        expect(ledger.mint('alice', -1)).toBe(false);
        expect(ledger.mint('alice', 1.5)).toBe(false);
    });
});

describe('renderMetadata', () => {
    const sources = { ...DEFAULT_METADATA_SOURCES, externalUrl: 'https://trivia.test' };

    it('describes loss tokens statically', () => {
        expect(renderMetadata(0, staticScheme(), lookup([]), sources)).toEqual({
            name: 'Trivia Participant',
            description: 'Awarded for taking part in a trivia round without winning it.',
            image: 'ipfs://trivia-rounds/loss.png',
            external_url: 'https://trivia.test',
            attributes: [{ trait_type: 'Outcome', value: 'Loss' }],
        });
    });

    it('embeds the round and winner name in win tokens', () => {
        const rounds = [round(1, { won: true, winner: 'alice', winnerDisplayName: 'Alice' })];
        const metadata = renderMetadata(1, roundIdScheme(), lookup(rounds), DEFAULT_METADATA_SOURCES);
        expect(metadata.name).toBe('Trivia Round #1: Winner');
        expect(metadata.description).toBe('Alice answered all questions of round 1 correctly.');
        expect(metadata.attributes).toContainEqual({ trait_type: 'Winner', value: 'Alice' });
        expect(metadata.external_url).toBeUndefined();
    });

    it('returns a pending descriptor for an unresolved round', () => {
        const metadata = renderMetadata(2, roundIdScheme(), lookup([round(1), round(2)]), DEFAULT_METADATA_SOURCES);
        expect(metadata.name).toBe('Trivia Round #2: Pending');
        expect(metadata.image).toBe('ipfs://trivia-rounds/pending.png');
    });

    it('rejects ids outside the issued range', () => {
        expectCode(() => renderMetadata(3, roundIdScheme(), lookup([round(1), round(2)]), sources), 'TokenNotFound');
        expectCode(() => renderMetadata(7, staticScheme(), lookup([]), sources), 'TokenNotFound');
        expectCode(() => renderMetadata(1002, perRoundScheme(1000, 2000), lookup([round(1)]), sources), 'TokenNotFound');
        const cancelled = [round(1, { won: true, cancelled: true })];
        expectCode(() => renderMetadata(1, roundIdScheme(), lookup(cancelled), sources), 'TokenNotFound');
    });

    it('follows engine state and metadata sources', () => {
        const { engine, wallet, advance } = setup({ scheme: roundIdScheme() });
        wallet.addToBalance(ADMIN, 100);
        wallet.addToBalance('alice', 1);
        startDefaultRound(engine);
        engine.fundPrize(ADMIN, 1, 100);
        expect(engine.tokenMetadata(1).name).toBe('Trivia Round #1: Pending');

        commitFor(engine, 'alice');
        advance(MIN_DELAY);
        engine.reveal('alice', ANSWERS, REVEAL_SALT);
        engine.setMetadataSources(ADMIN, { winImage: 'https://cdn.test/win.png' });

        const metadata = engine.tokenMetadata(1);
        expect(metadata.description).toBe('Player One answered all questions of round 1 correctly.');
        expect(metadata.image).toBe('https://cdn.test/win.png');
    });
});
