import { isZeroHash } from '../crypto';
import { CommitInfo } from './types';
import { Journal } from './journal';

function commitKey(roundId: number, playerId: string): string {
    return `${roundId}|${playerId}`;
}

/**
 * A commitment is expired once its reveal window has fully elapsed.
 */
export function isExpired(info: CommitInfo, maxRevealDelay: number, now: number): boolean {
    return now >= info.commitTime + maxRevealDelay;
}

/**
 * Per-round, per-player commitment records.
 */
export class CommitStore {
    private commits = new Map<string, CommitInfo>();

    get(roundId: number, playerId: string): CommitInfo | undefined {
        const info = this.commits.get(commitKey(roundId, playerId));
        if (!info || isZeroHash(info.commitHash)) return undefined;
        return info;
    }

    /**
     * Stores a fresh commitment, replacing any previous record.
     */
    write(roundId: number, playerId: string, info: CommitInfo, journal: Journal): void {
        const key = commitKey(roundId, playerId);
        const previous = this.commits.get(key);
        this.commits.set(key, info);
        journal.onRollback(() => {
            if (previous) this.commits.set(key, previous);
            else this.commits.delete(key);
        });
    }

    delete(roundId: number, playerId: string, journal: Journal): void {
        const key = commitKey(roundId, playerId);
        const previous = this.commits.get(key);
        if (!previous) return;
        this.commits.delete(key);
        journal.onRollback(() => {
            this.commits.set(key, previous);
        });
    }
}

/**
 * Append-only list of every player that committed in a round.
 * Entries are never removed, even after their commitment is cleared.
 */
export class PlayerIndex {
    private lists = new Map<number, string[]>();
    private members = new Map<number, Set<string>>();

    register(roundId: number, playerId: string, journal: Journal): void {
        let members = this.members.get(roundId);
        if (!members) {
            members = new Set();
            this.members.set(roundId, members);
        }
        if (members.has(playerId)) return;
        const list = this.lists.get(roundId) ?? [];
        this.lists.set(roundId, list);
        members.add(playerId);
        list.push(playerId);
        const registered = members;
        journal.onRollback(() => {
            registered.delete(playerId);
            list.pop();
        });
    }

    has(roundId: number, playerId: string): boolean {
        return this.members.get(roundId)?.has(playerId) ?? false;
    }

    count(roundId: number): number {
        return this.lists.get(roundId)?.length ?? 0;
    }

    /**
     * Returns a bounded slice of the player list. Empty past the end.
     */
    page(roundId: number, offset: number, limit: number): string[] {
        const list = this.lists.get(roundId) ?? [];
        if (offset >= list.length) return [];
        return list.slice(offset, offset + limit);
    }
}
