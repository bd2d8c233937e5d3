/**
 * Manages player identities and the secret keys that authenticate them.
 * NOTE: keys are held in memory in plain text. A real deployment should
 * persist them and store only their hashes.
 */
export class PlayerRegistry {
    private playersByKey = new Map<string, string>(); // key -> playerId
    private keysByPlayerId = new Map<string, string>(); // playerId -> key

    /**
     * Creates a new player with a secret key.
     * @param playerId The unique ID for the player.
     * @param key The secret key for the player.
     */
    createPlayer(playerId: string, key: string): void {
        this.playersByKey.set(key, playerId);
        this.keysByPlayerId.set(playerId, key);
    }

    /**
     * Finds a player by their secret key.
     * @param key The secret key.
     * @returns The playerId, or undefined if not found.
     */
    getPlayerIdByKey(key: string): string | undefined {
        return this.playersByKey.get(key);
    }

    /**
     * Checks if a player ID already exists.
     * @param playerId The player ID to check.
     * @returns True if the player exists, false otherwise.
     */
    playerExists(playerId: string): boolean {
        return this.keysByPlayerId.has(playerId);
    }

    /**
     * Returns a list of all registered player IDs.
     */
    listPlayers(): string[] {
        return Array.from(this.keysByPlayerId.keys());
    }
}
