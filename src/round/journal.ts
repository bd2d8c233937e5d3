import { RoundError } from '../errors';
import { log } from '../log';

type Undo = () => void;

/**
 * Undo log for a single engine operation. Every state write and every
 * successful external effect registers its compensation here; on failure
 * the compensations run newest first.
 */
export class Journal {
    private undos: Undo[] = [];

    /**
     * Assigns a property and records its previous value.
     */
    set<T extends object, K extends keyof T>(target: T, key: K, value: T[K]): void {
        const previous = target[key];
        target[key] = value;
        this.undos.push(() => {
            target[key] = previous;
        });
    }

    onRollback(undo: Undo): void {
        this.undos.push(undo);
    }

    rollback(): void {
        while (this.undos.length > 0) {
            const undo = this.undos.pop();
            if (!undo) break;
            try {
                undo();
            } catch (err) {
                log('error', 'journal', 'compensation_failed', { error: String(err) });
            }
        }
    }
}

/**
 * Serializes mutating operations. A call made while another one holds the
 * lock (e.g. from inside an escrow or mint callback) is rejected.
 */
export class OperationLock {
    private holder: string | undefined;

    run<T>(operation: string, fn: (journal: Journal) => T, keepEffects?: (err: unknown) => boolean): T {
        if (this.holder !== undefined) {
            throw new RoundError('ReentrantCall', `${operation} called during ${this.holder}`);
        }
        this.holder = operation;
        const journal = new Journal();
        try {
            return fn(journal);
        } catch (err) {
            if (!keepEffects || !keepEffects(err)) journal.rollback();
            throw err;
        } finally {
            this.holder = undefined;
        }
    }

    get busy(): boolean {
        return this.holder !== undefined;
    }
}
