/**
 * Custodial value transfer. Both operations report failure instead of
 * throwing; the engine treats `false` as abort-with-rollback.
 */
export interface EscrowLedger {
    /** Moves `amount` from a participant into custody. */
    pull(from: string, amount: number): boolean;
    /** Moves `amount` from custody to a recipient. */
    push(to: string, amount: number): boolean;
}

/**
 * Issues win/loss outcome tokens.
 */
export interface OutcomeIssuer {
    mint(to: string, tokenId: number): boolean;
    /** Only used to compensate a mint inside a failed operation. */
    burn(from: string, tokenId: number): boolean;
}
