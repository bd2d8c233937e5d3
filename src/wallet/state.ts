import { EscrowLedger } from '../round/dependencies';

/**
 * Manages the in-memory ledger for player balances and the custody pool.
 */
export class Wallet {
    // For simplicity, balances are stored in a key-value map in memory.
    // In a real application, this should be a persistent database.
    private balances = new Map<string, number>();
    private custody = 0;

    /**
     * Gets the balance for a given player.
     * @param playerId The ID of the player.
     * @returns The player's current balance, or 0 if they have no record.
     */
    getBalance(playerId: string): number {
        return this.balances.get(playerId) ?? 0;
    }

    /**
     * Adds a specified amount to a player's balance.
     * @param playerId The ID of the player.
     * @param amount The amount to add.
     * @returns The new balance.
     */
    addToBalance(playerId: string, amount: number): number {
        const newBalance = this.getBalance(playerId) + amount;
        this.balances.set(playerId, newBalance);
        return newBalance;
    }

    /**
     * Subtracts a specified amount from a player's balance.
     * @param playerId The ID of the player.
     * @param amount The amount to subtract.
     * @returns The new balance, or undefined if the balance is insufficient.
     */
    subtractFromBalance(playerId: string, amount: number): number | undefined {
        const currentBalance = this.getBalance(playerId);
        if (currentBalance < amount) return undefined;
        const newBalance = currentBalance - amount;
        this.balances.set(playerId, newBalance);
        return newBalance;
    }

    /**
     * Gets the amount currently held in escrow.
     * @returns The custody balance.
     */
    getCustodyBalance(): number {
        return this.custody;
    }

    /**
     * Escrow view over this wallet: pulls debit a player into custody,
     * pushes credit a player out of custody.
     */
    escrow(): EscrowLedger {
        return {
            pull: (from, amount) => {
                if (!from || !Number.isSafeInteger(amount) || amount <= 0) return false;
                if (!Number.isSafeInteger(this.custody + amount)) return false;
                if (this.subtractFromBalance(from, amount) === undefined) return false;
                this.custody += amount;
                return true;
            },
            push: (to, amount) => {
                if (!to || !Number.isSafeInteger(amount) || amount <= 0) return false;
                if (this.custody < amount || !Number.isSafeInteger(this.getBalance(to) + amount)) return false;
                this.custody -= amount;
                this.addToBalance(to, amount);
                return true;
            },
        };
    }
}
