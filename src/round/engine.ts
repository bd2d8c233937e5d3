import { EventEmitter } from 'events';
import { ANSWER_COUNT, ZERO_HASH, isHash, isZeroHash } from '../crypto';
import { RoundError } from '../errors';
import { log } from '../log';
import { BanList } from '../ban/state';
import { DEFAULT_METADATA_SOURCES, MetadataSources, TokenMetadata, renderMetadata } from '../tokens/metadata';
import { TokenIdScheme } from '../tokens/scheme';
import { CommitStore, PlayerIndex, isExpired } from './commits';
import { EscrowLedger, OutcomeIssuer } from './dependencies';
import { Journal, OperationLock } from './journal';
import { DisplayNamePolicy, isValidDisplayName } from './names';
import { checkAnswers, verifyCommitment } from './verifier';
import {
    CancellationProgress,
    CommitStatus,
    EconomicsParams,
    PlayerPage,
    RevealResult,
    Round,
    RoundEvents,
    RoundStatus,
    StartRoundParams,
    TimingWindow,
} from './types';

export type EngineOptions = {
    adminId: string;
    escrow: EscrowLedger;
    issuer: OutcomeIssuer;
    scheme: TokenIdScheme;
    defaultWindow: TimingWindow;
    displayNamePolicy: DisplayNamePolicy;
    cancelBatchSize: number;
    maxPageSize: number;
    bans?: BanList;
    metadata?: MetadataSources;
    now?: () => number;
};

type Notify = <K extends keyof RoundEvents>(event: K, payload: RoundEvents[K]) => void;

// A correct reveal against an underfunded prize keeps its revealed mark.
function isForfeiture(err: unknown): boolean {
    return err instanceof RoundError && err.code === 'PrizeNotFunded';
}

function isAmount(value: number): boolean {
    return Number.isSafeInteger(value) && value >= 0;
}

function isPositiveAmount(value: number): boolean {
    return Number.isSafeInteger(value) && value > 0;
}

function requirePositiveAmount(amount: number): void {
    if (!Number.isSafeInteger(amount)) throw new RoundError('InvalidRequest', 'amount must be a safe integer');
    if (amount <= 0) throw new RoundError('ZeroAmount');
}

function validateWindow(window: TimingWindow): void {
    const { minRevealDelay, maxRevealDelay } = window;
    if (!isAmount(minRevealDelay) || !isAmount(maxRevealDelay) || minRevealDelay >= maxRevealDelay) {
        throw new RoundError('InvalidTimingWindow');
    }
}

function validateAnswerHashes(hashes: readonly string[]): void {
    if (hashes.length !== ANSWER_COUNT || !hashes.every(isHash)) {
        throw new RoundError('InvalidAnswers');
    }
}

function validateEconomics(entryFee: number, prizeAmount: number): void {
    if (!isAmount(entryFee) || !isAmount(prizeAmount)) {
        throw new RoundError('InvalidRequest', 'entry fee and prize amount must be non-negative integers');
    }
}

/**
 * Owns every round and orchestrates the commit → reveal → resolve flow.
 *
 * Mutating operations run one at a time under an operation lock with an
 * undo journal: a failure leaves no trace in rounds, commitments, escrow or
 * issued tokens. Notifications are published only after an operation
 * completes.
 */
export class RoundEngine {
    private rounds = new Map<number, Round>();
    private current = 0;
    private readonly commits = new CommitStore();
    private readonly players = new PlayerIndex();
    private readonly bans: BanList;
    private readonly lock = new OperationLock();
    private readonly events = new EventEmitter();
    private metadataSources: MetadataSources;
    private readonly now: () => number;

    constructor(private readonly options: EngineOptions) {
        validateWindow(options.defaultWindow);
        this.bans = options.bans ?? new BanList();
        this.metadataSources = options.metadata ?? DEFAULT_METADATA_SOURCES;
        this.now = options.now ?? Date.now;
    }

    get currentRound(): number {
        return this.current;
    }

    get adminId(): string {
        return this.options.adminId;
    }

    /**
     * Subscribes to an engine notification.
     */
    on<K extends keyof RoundEvents>(event: K, listener: (payload: RoundEvents[K]) => void): () => void {
        this.events.on(event, listener);
        return () => {
            this.events.off(event, listener);
        };
    }

    // ----- administrative surface -----

    startRound(caller: string, params: StartRoundParams): RoundStatus {
        return this.mutate('startRound', (journal, notify) => {
            this.requireAdmin(caller);
            if (!isHash(params.salt) || isZeroHash(params.salt)) {
                throw new RoundError('InvalidCommitment', 'round salt must be a nonzero 32-byte hex value');
            }
            validateAnswerHashes(params.answerHashes);
            validateEconomics(params.entryFee, params.prizeAmount);
            const window = params.window ?? this.options.defaultWindow;
            validateWindow(window);

            const id = this.current + 1;
            if (id > this.options.scheme.maxRoundId) throw new RoundError('RoundLimitReached');
            const round: Round = {
                id,
                startedAt: this.now(),
                entryFee: params.entryFee,
                prizeAmount: params.prizeAmount,
                answerSalt: params.salt,
                correctAnswerHashes: [...params.answerHashes],
                minRevealDelay: window.minRevealDelay,
                maxRevealDelay: window.maxRevealDelay,
                prizeFunded: 0,
                won: false,
                cancelled: false,
                cancelCursor: 0,
            };
            this.rounds.set(id, round);
            journal.onRollback(() => {
                this.rounds.delete(id);
            });
            const previousRound = this.current;
            this.current = id;
            journal.onRollback(() => {
                this.current = previousRound;
            });

            notify('RoundStarted', {
                roundId: id,
                entryFee: round.entryFee,
                prizeAmount: round.prizeAmount,
                minRevealDelay: round.minRevealDelay,
                maxRevealDelay: round.maxRevealDelay,
            });
            return this.project(round);
        });
    }

    updateAnswers(caller: string, answerHashes: string[]): void {
        this.mutate('updateAnswers', (journal, notify) => {
            this.requireAdmin(caller);
            const round = this.activeRound();
            validateAnswerHashes(answerHashes);
            journal.set(round, 'correctAnswerHashes', [...answerHashes]);
            notify('AnswersUpdated', { roundId: round.id });
        });
    }

    updateEconomics(caller: string, params: EconomicsParams): RoundStatus {
        return this.mutate('updateEconomics', (journal, notify) => {
            this.requireAdmin(caller);
            const round = this.activeRound();
            validateEconomics(params.entryFee, params.prizeAmount);
            validateWindow(params);
            journal.set(round, 'entryFee', params.entryFee);
            journal.set(round, 'prizeAmount', params.prizeAmount);
            journal.set(round, 'minRevealDelay', params.minRevealDelay);
            journal.set(round, 'maxRevealDelay', params.maxRevealDelay);
            notify('EconomicsUpdated', { roundId: round.id, ...params });
            return this.project(round);
        });
    }

    /**
     * Pulls prize money from the administrator into escrow for any started round.
     */
    fundPrize(caller: string, roundId: number, amount: number): RoundStatus {
        return this.mutate('fundPrize', (journal, notify) => {
            this.requireAdmin(caller);
            requirePositiveAmount(amount);
            const round = this.requireRound(roundId);
            if (!Number.isSafeInteger(round.prizeFunded + amount)) {
                throw new RoundError('InvalidRequest', 'funded prize would exceed the largest safe amount');
            }
            this.pull(journal, caller, amount);
            journal.set(round, 'prizeFunded', round.prizeFunded + amount);
            notify('PrizeFunded', { roundId, amount, prizeFunded: round.prizeFunded });
            return this.project(round);
        });
    }

    withdraw(caller: string, to: string, amount: number): void {
        this.mutate('withdraw', (journal, notify) => {
            this.requireAdmin(caller);
            if (!to) throw new RoundError('ZeroAddress');
            requirePositiveAmount(amount);
            this.push(journal, to, amount);
            notify('Withdrawn', { to, amount });
        });
    }

    setBanned(caller: string, playerId: string, banned: boolean): void {
        this.mutate('setBanned', (journal, notify) => {
            this.requireAdmin(caller);
            if (!playerId) throw new RoundError('ZeroAddress');
            const previous = this.bans.set(playerId, banned);
            journal.onRollback(() => {
                this.bans.set(playerId, previous);
            });
            notify('BanUpdated', { playerId, banned });
        });
    }

    setMetadataSources(caller: string, sources: Partial<MetadataSources>): MetadataSources {
        return this.mutate('setMetadataSources', journal => {
            this.requireAdmin(caller);
            const previous = this.metadataSources;
            this.metadataSources = { ...previous, ...sources };
            journal.onRollback(() => {
                this.metadataSources = previous;
            });
            return this.metadataSources;
        });
    }

    /**
     * Resolves the current round without a winner and starts issuing loss
     * tokens to every unrevealed committer, at most `batchSize` players per call.
     */
    cancelCurrentRound(caller: string, batchSize?: number): CancellationProgress {
        return this.mutate('cancelCurrentRound', (journal, notify) => {
            this.requireAdmin(caller);
            const round = this.activeRound();
            journal.set(round, 'won', true);
            journal.set(round, 'cancelled', true);
            journal.set(round, 'winner', undefined);
            notify('RoundCancelled', { roundId: round.id, total: this.players.count(round.id) });
            return this.forceResolve(journal, notify, round, batchSize);
        });
    }

    /**
     * Continues forced resolution of a cancelled round from its cursor.
     */
    resumeCancellation(caller: string, roundId: number, batchSize?: number): CancellationProgress {
        return this.mutate('resumeCancellation', (journal, notify) => {
            this.requireAdmin(caller);
            const round = this.requireRound(roundId);
            if (!round.cancelled) throw new RoundError('RoundNotCancelled');
            return this.forceResolve(journal, notify, round, batchSize);
        });
    }

    // ----- participant surface -----

    commit(caller: string, commitHash: string, displayName: string): CommitStatus {
        return this.mutate('commit', (journal, notify) => {
            this.requirePlayer(caller);
            const round = this.activeRound();
            if (!isHash(commitHash) || isZeroHash(commitHash)) throw new RoundError('InvalidCommitment');
            if (!isValidDisplayName(displayName, this.options.displayNamePolicy)) {
                throw new RoundError('InvalidDisplayName');
            }

            const now = this.now();
            const existing = this.commits.get(round.id, caller);
            if (existing && !existing.revealed && !isExpired(existing, round.maxRevealDelay, now)) {
                throw new RoundError('ActiveCommitExists');
            }

            if (round.entryFee > 0) this.pull(journal, caller, round.entryFee);
            this.commits.write(round.id, caller, { commitHash, commitTime: now, revealed: false, displayName }, journal);
            this.players.register(round.id, caller, journal);

            notify('Committed', { roundId: round.id, playerId: caller, commitHash, displayName });
            return this.commitStatus(round.id, caller);
        });
    }

    /**
     * Reveals a commitment and resolves it. A correct answer set wins the
     * round and its prize; anything else earns a loss token.
     *
     * A supplied display name must equal the one stored at commit time.
     * A correct reveal while the prize is underfunded fails with
     * PrizeNotFunded and still consumes the commitment.
     */
    reveal(caller: string, answers: string[], revealSalt: string, displayName?: string): RevealResult {
        return this.mutate('reveal', (journal, notify) => {
            this.requirePlayer(caller);
            const round = this.activeRound();
            if (answers.length !== ANSWER_COUNT) throw new RoundError('InvalidAnswers');
            if (!isHash(revealSalt)) throw new RoundError('InvalidRequest', 'reveal salt must be a 32-byte hex value');

            const info = this.commits.get(round.id, caller);
            if (!info) throw new RoundError('NoCommitment');
            if (info.revealed) throw new RoundError('AlreadyRevealed');
            const now = this.now();
            if (now < info.commitTime + round.minRevealDelay) throw new RoundError('TooEarlyToReveal');
            if (isExpired(info, round.maxRevealDelay, now)) throw new RoundError('CommitmentExpired');

            if (displayName !== undefined && displayName !== info.displayName) {
                throw new RoundError('CommitmentMismatch', 'display name does not match the committed one');
            }
            const name = info.displayName;
            verifyCommitment({ playerId: caller, displayName: name, answers, revealSalt }, info.commitHash);
            journal.set(info, 'revealed', true);

            const correct = checkAnswers(round.answerSalt, answers, round.correctAnswerHashes);
            let tokenId: number;
            let payout = 0;
            if (correct) {
                if (round.prizeFunded < round.prizeAmount) {
                    notify('RevealForfeited', { roundId: round.id, playerId: caller, displayName: name });
                    throw new RoundError('PrizeNotFunded');
                }
                payout = round.prizeAmount;
                journal.set(round, 'prizeFunded', round.prizeFunded - payout);
                if (payout > 0) this.push(journal, caller, payout);
                journal.set(round, 'won', true);
                journal.set(round, 'winner', caller);
                journal.set(round, 'winnerDisplayName', name);
                tokenId = this.options.scheme.winId(round.id);
            } else {
                tokenId = this.options.scheme.lossId(round.id);
            }
            this.mint(journal, caller, tokenId);

            notify('Revealed', { roundId: round.id, playerId: caller, correct, tokenId, displayName: name });
            return { roundId: round.id, correct, tokenId, payout };
        });
    }

    // ----- permissionless surface -----

    /**
     * Deletes an expired, never revealed commitment. The entry fee stays in custody.
     */
    clearExpiredCommit(roundId: number, playerId: string): void {
        this.mutate('clearExpiredCommit', (journal, notify) => {
            const round = this.requireRound(roundId);
            const info = this.commits.get(roundId, playerId);
            if (!info) throw new RoundError('NoCommitment');
            if (info.revealed) throw new RoundError('AlreadyRevealed');
            if (!isExpired(info, round.maxRevealDelay, this.now())) throw new RoundError('CommitmentNotExpired');
            this.commits.delete(roundId, playerId, journal);
            notify('CommitCleared', { roundId, playerId });
        });
    }

    listPlayers(roundId: number, offset: number, limit: number): PlayerPage {
        this.requireRound(roundId);
        if (!isAmount(offset) || !isAmount(limit)) {
            throw new RoundError('InvalidRequest', 'offset and limit must be non-negative integers');
        }
        const size = Math.min(limit, this.options.maxPageSize);
        return {
            roundId,
            total: this.players.count(roundId),
            offset,
            players: this.players.page(roundId, offset, size),
        };
    }

    // ----- query surface -----

    status(roundId: number): RoundStatus {
        return this.project(this.requireRound(roundId));
    }

    currentStatus(): RoundStatus | undefined {
        const round = this.rounds.get(this.current);
        return round ? this.project(round) : undefined;
    }

    commitStatus(roundId: number, playerId: string): CommitStatus {
        const round = this.requireRound(roundId);
        const info = this.commits.get(roundId, playerId);
        if (!info) {
            return { present: false, revealed: false, expired: false, commitTime: 0, displayName: '', commitHash: ZERO_HASH };
        }
        return {
            present: true,
            revealed: info.revealed,
            expired: !info.revealed && isExpired(info, round.maxRevealDelay, this.now()),
            commitTime: info.commitTime,
            displayName: info.displayName,
            commitHash: info.commitHash,
        };
    }

    isBanned(playerId: string): boolean {
        return this.bans.isBanned(playerId);
    }

    /**
     * Returns a copy of a round, or undefined for an unknown id.
     */
    getRound(roundId: number): Round | undefined {
        const round = this.rounds.get(roundId);
        return round ? { ...round, correctAnswerHashes: [...round.correctAnswerHashes] } : undefined;
    }

    tokenMetadata(tokenId: number): TokenMetadata {
        return renderMetadata(tokenId, this.options.scheme, this, this.metadataSources);
    }

    // ----- internals -----

    private mutate<T>(operation: string, fn: (journal: Journal, notify: Notify) => T): T {
        const pending: (() => void)[] = [];
        const notify: Notify = (event, payload) => {
            pending.push(() => this.publish(event, payload));
        };
        try {
            const result = this.lock.run(operation, journal => fn(journal, notify), isForfeiture);
            pending.forEach(publish => publish());
            return result;
        } catch (err) {
            if (isForfeiture(err)) pending.forEach(publish => publish());
            throw err;
        }
    }

    private publish<K extends keyof RoundEvents>(event: K, payload: RoundEvents[K]): void {
        log('info', 'round', event, payload);
        this.events.emit(event, payload);
    }

    private forceResolve(journal: Journal, notify: Notify, round: Round, batchSize?: number): CancellationProgress {
        const size = batchSize ?? this.options.cancelBatchSize;
        if (!isPositiveAmount(size)) throw new RoundError('InvalidRequest', 'batch size must be a positive integer');

        const total = this.players.count(round.id);
        const start = round.cancelCursor;
        const batch = this.players.page(round.id, start, size);
        let affected = 0;
        for (const playerId of batch) {
            const info = this.commits.get(round.id, playerId);
            if (!info || info.revealed) continue;
            journal.set(info, 'revealed', true);
            this.mint(journal, playerId, this.options.scheme.lossId(round.id));
            affected++;
        }
        journal.set(round, 'cancelCursor', start + batch.length);

        const progress: CancellationProgress = {
            roundId: round.id,
            affected,
            cursor: round.cancelCursor,
            total,
            done: round.cancelCursor >= total,
        };
        notify('CancellationProgress', progress);
        return progress;
    }

    private pull(journal: Journal, from: string, amount: number): void {
        if (!this.options.escrow.pull(from, amount)) throw new RoundError('EscrowTransferFailed');
        journal.onRollback(() => {
            if (!this.options.escrow.push(from, amount)) {
                log('error', 'round', 'escrow_compensation_failed', { direction: 'push', playerId: from, amount });
            }
        });
    }

    private push(journal: Journal, to: string, amount: number): void {
        if (!this.options.escrow.push(to, amount)) throw new RoundError('EscrowTransferFailed');
        journal.onRollback(() => {
            if (!this.options.escrow.pull(to, amount)) {
                log('error', 'round', 'escrow_compensation_failed', { direction: 'pull', playerId: to, amount });
            }
        });
    }

    private mint(journal: Journal, to: string, tokenId: number): void {
        if (!this.options.issuer.mint(to, tokenId)) throw new RoundError('MintFailed');
        journal.onRollback(() => {
            if (!this.options.issuer.burn(to, tokenId)) {
                log('error', 'round', 'mint_compensation_failed', { playerId: to, tokenId });
            }
        });
    }

    private requireAdmin(caller: string): void {
        if (caller !== this.options.adminId) throw new RoundError('NotAdministrator');
    }

    private requirePlayer(caller: string): void {
        if (!caller) throw new RoundError('ZeroAddress');
        if (this.bans.isBanned(caller)) throw new RoundError('Banned');
    }

    private requireRound(roundId: number): Round {
        const round = Number.isInteger(roundId) ? this.rounds.get(roundId) : undefined;
        if (!round) throw new RoundError('RoundNotFound');
        return round;
    }

    private activeRound(): Round {
        const round = this.rounds.get(this.current);
        if (!round) throw new RoundError('NoActiveRound');
        if (round.won) throw new RoundError('RoundAlreadyResolved');
        return round;
    }

    private project(round: Round): RoundStatus {
        return {
            roundId: round.id,
            entryFee: round.entryFee,
            prizeAmount: round.prizeAmount,
            prizeFunded: round.prizeFunded,
            active: round.id === this.current && !round.won,
            funded: round.prizeFunded >= round.prizeAmount,
            completed: round.won,
            cancelled: round.cancelled,
            winner: round.winner,
            winnerDisplayName: round.winnerDisplayName,
            playerCount: this.players.count(round.id),
            minRevealDelay: round.minRevealDelay,
            maxRevealDelay: round.maxRevealDelay,
        };
    }
}
