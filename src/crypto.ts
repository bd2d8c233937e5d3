import { createHash, randomBytes } from 'crypto';

/** Number of questions in every round. */
export const ANSWER_COUNT = 10;

/** 32 zero bytes, hex encoded. Marks an absent commitment. */
export const ZERO_HASH = '0'.repeat(64);

const HASH_PATTERN = /^[0-9a-f]{64}$/;

/**
 * Checks that a value is a lowercase hex encoding of exactly 32 bytes.
 */
export function isHash(value: string): boolean {
    return HASH_PATTERN.test(value);
}

export function isZeroHash(value: string): boolean {
    return value === ZERO_HASH;
}

/**
 * SHA-256 over the concatenation of the given byte chunks.
 * @returns The digest as a 64-character hex string.
 */
export function sha256(...chunks: Buffer[]): string {
    const hash = createHash('sha256');
    for (const chunk of chunks) hash.update(chunk);
    return hash.digest('hex');
}

function hexBytes(hex: string): Buffer {
    return Buffer.from(hex, 'hex');
}

function uint32(n: number): Buffer {
    const buf = Buffer.alloc(4);
    buf.writeUInt32BE(n, 0);
    return buf;
}

/**
 * Canonical encoding of an answer set: a 4-byte big-endian count, then each
 * answer as a 4-byte big-endian UTF-8 length followed by its bytes.
 */
export function encodeAnswers(answers: readonly string[]): Buffer {
    const parts: Buffer[] = [uint32(answers.length)];
    for (const answer of answers) {
        const bytes = Buffer.from(answer, 'utf8');
        parts.push(uint32(bytes.length), bytes);
    }
    return Buffer.concat(parts);
}

/**
 * Builds the commitment a participant submits before revealing.
 * H(identity ‖ H(displayName) ‖ H(encode(answers)) ‖ revealSalt)
 * @param revealSalt 32-byte hex salt chosen by the participant.
 */
export function computeCommitment(
    identity: string,
    displayName: string,
    answers: readonly string[],
    revealSalt: string,
): string {
    const nameHash = sha256(Buffer.from(displayName, 'utf8'));
    const answersHash = sha256(encodeAnswers(answers));
    return sha256(Buffer.from(identity, 'utf8'), hexBytes(nameHash), hexBytes(answersHash), hexBytes(revealSalt));
}

/**
 * Salted hash of a single answer, as stored in a round's answer key.
 * @param roundSalt 32-byte hex salt of the round.
 */
export function hashAnswer(roundSalt: string, answer: string): string {
    return sha256(hexBytes(roundSalt), Buffer.from(answer, 'utf8'));
}

export function hashAnswers(roundSalt: string, answers: readonly string[]): string[] {
    return answers.map(answer => hashAnswer(roundSalt, answer));
}

/**
 * Generates a random 32-byte salt.
 */
export function randomSalt(): string {
    return randomBytes(32).toString('hex');
}

/**
 * Generates a cryptographically secure random ID.
 * @returns A 32-character hex string.
 */
export function cryptoRandomId(): string {
    return randomBytes(16).toString('hex');
}
