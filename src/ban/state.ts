/**
 * Administrator-controlled ban list. Bans have no expiry.
 */
export class BanList {
    private banned = new Set<string>();

    isBanned(playerId: string): boolean {
        return this.banned.has(playerId);
    }

    /**
     * @returns The previous ban status, so callers can undo the change.
     */
    set(playerId: string, banned: boolean): boolean {
        const previous = this.banned.has(playerId);
        if (banned) this.banned.add(playerId);
        else this.banned.delete(playerId);
        return previous;
    }
}
