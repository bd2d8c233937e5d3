import { OutcomeIssuer } from '../round/dependencies';

/**
 * In-memory multi-token ledger for outcome tokens.
 */
export class TokenLedger implements OutcomeIssuer {
    private balances = new Map<string, Map<number, number>>();
    private supply = new Map<number, number>();

    mint(to: string, tokenId: number): boolean {
        if (!to || !Number.isInteger(tokenId) || tokenId < 0) return false;
        const owned = this.balances.get(to) ?? new Map<number, number>();
        owned.set(tokenId, (owned.get(tokenId) ?? 0) + 1);
        this.balances.set(to, owned);
        this.supply.set(tokenId, (this.supply.get(tokenId) ?? 0) + 1);
        return true;
    }

    burn(from: string, tokenId: number): boolean {
        const owned = this.balances.get(from);
        const balance = owned?.get(tokenId) ?? 0;
        if (!owned || balance === 0) return false;
        if (balance === 1) owned.delete(tokenId);
        else owned.set(tokenId, balance - 1);
        const remaining = (this.supply.get(tokenId) ?? 1) - 1;
        if (remaining === 0) this.supply.delete(tokenId);
        else this.supply.set(tokenId, remaining);
        return true;
    }

    balanceOf(owner: string, tokenId: number): number {
        return this.balances.get(owner)?.get(tokenId) ?? 0;
    }

    /**
     * Lists every token id a player holds with its count, ordered by id.
     */
    holdings(owner: string): { tokenId: number; amount: number }[] {
        const owned = this.balances.get(owner);
        if (!owned) return [];
        return Array.from(owned.entries())
            .map(([tokenId, amount]) => ({ tokenId, amount }))
            .sort((a, b) => a.tokenId - b.tokenId);
    }

    totalSupply(tokenId: number): number {
        return this.supply.get(tokenId) ?? 0;
    }
}
