import { ANSWER_COUNT, computeCommitment, hashAnswer } from '../crypto';
import { RoundError } from '../errors';

export type RevealData = {
    playerId: string;
    displayName: string;
    answers: readonly string[];
    revealSalt: string;
};

/**
 * Recomputes the commitment from revealed data and compares it with the
 * stored one.
 */
export function verifyCommitment(reveal: RevealData, commitHash: string): void {
    const recomputed = computeCommitment(reveal.playerId, reveal.displayName, reveal.answers, reveal.revealSalt);
    if (recomputed !== commitHash) {
        throw new RoundError('CommitmentMismatch');
    }
}

/**
 * True only if every answer hashes (with the round salt) to its key entry.
 */
export function checkAnswers(roundSalt: string, answers: readonly string[], correctAnswerHashes: readonly string[]): boolean {
    if (answers.length !== ANSWER_COUNT || correctAnswerHashes.length !== ANSWER_COUNT) return false;
    return answers.every((answer, i) => hashAnswer(roundSalt, answer) === correctAnswerHashes[i]);
}
