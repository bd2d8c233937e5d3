import { LogLevel } from './log';

export type ErrorCategory = 'validation' | 'state_conflict' | 'access_control' | 'dependency_failure';

export type RoundErrorCode =
    | 'InvalidRequest'
    | 'ZeroAddress'
    | 'ZeroAmount'
    | 'InvalidDisplayName'
    | 'InvalidAnswers'
    | 'InvalidTimingWindow'
    | 'InvalidCommitment'
    | 'RoundNotFound'
    | 'TokenNotFound'
    | 'NoActiveRound'
    | 'RoundAlreadyResolved'
    | 'RoundNotCancelled'
    | 'RoundLimitReached'
    | 'ActiveCommitExists'
    | 'NoCommitment'
    | 'AlreadyRevealed'
    | 'CommitmentExpired'
    | 'CommitmentNotExpired'
    | 'TooEarlyToReveal'
    | 'CommitmentMismatch'
    | 'PrizeNotFunded'
    | 'ReentrantCall'
    | 'Unauthenticated'
    | 'NotAdministrator'
    | 'Banned'
    | 'EscrowTransferFailed'
    | 'MintFailed';

type ErrorDefinition = { category: ErrorCategory; status: number; message: string; level: LogLevel };

const ERROR_DEFINITIONS: Record<RoundErrorCode, ErrorDefinition> = {
    InvalidRequest: { category: 'validation', status: 400, message: 'invalid request', level: 'warn' },
    ZeroAddress: { category: 'validation', status: 400, message: 'recipient is required', level: 'warn' },
    ZeroAmount: { category: 'validation', status: 400, message: 'amount must be positive', level: 'warn' },
    InvalidDisplayName: { category: 'validation', status: 400, message: 'invalid display name', level: 'warn' },
    InvalidAnswers: { category: 'validation', status: 400, message: 'exactly 10 answers are required', level: 'warn' },
    InvalidTimingWindow: { category: 'validation', status: 400, message: 'minimum delay must be below maximum delay', level: 'warn' },
    InvalidCommitment: { category: 'validation', status: 400, message: 'commitment or salt must be nonzero', level: 'warn' },
    RoundNotFound: { category: 'validation', status: 404, message: 'round not found', level: 'warn' },
    TokenNotFound: { category: 'validation', status: 404, message: 'token not found', level: 'warn' },
    NoActiveRound: { category: 'state_conflict', status: 409, message: 'no active round', level: 'warn' },
    RoundAlreadyResolved: { category: 'state_conflict', status: 409, message: 'round already resolved', level: 'warn' },
    RoundNotCancelled: { category: 'state_conflict', status: 409, message: 'round was not cancelled', level: 'warn' },
    RoundLimitReached: { category: 'state_conflict', status: 409, message: 'token id range exhausted for new rounds', level: 'error' },
    ActiveCommitExists: { category: 'state_conflict', status: 409, message: 'an active commitment already exists', level: 'warn' },
    NoCommitment: { category: 'state_conflict', status: 409, message: 'no commitment found', level: 'warn' },
    AlreadyRevealed: { category: 'state_conflict', status: 409, message: 'commitment already revealed', level: 'warn' },
    CommitmentExpired: { category: 'state_conflict', status: 409, message: 'commitment expired', level: 'warn' },
    CommitmentNotExpired: { category: 'state_conflict', status: 409, message: 'commitment has not expired', level: 'warn' },
    TooEarlyToReveal: { category: 'state_conflict', status: 409, message: 'too early to reveal', level: 'warn' },
    CommitmentMismatch: { category: 'state_conflict', status: 409, message: 'revealed data does not match commitment', level: 'warn' },
    PrizeNotFunded: { category: 'state_conflict', status: 409, message: 'prize is not funded', level: 'warn' },
    ReentrantCall: { category: 'state_conflict', status: 409, message: 'operation already in progress', level: 'error' },
    Unauthenticated: { category: 'access_control', status: 401, message: 'Authorization header with Bearer token is required', level: 'warn' },
    NotAdministrator: { category: 'access_control', status: 403, message: 'administrator only', level: 'warn' },
    Banned: { category: 'access_control', status: 403, message: 'player is banned', level: 'warn' },
    EscrowTransferFailed: { category: 'dependency_failure', status: 502, message: 'escrow transfer failed', level: 'error' },
    MintFailed: { category: 'dependency_failure', status: 502, message: 'outcome token mint failed', level: 'error' },
};

/**
 * Error raised by every round operation. The code identifies the failure,
 * the category and HTTP status derive from it.
 */
export class RoundError extends Error {
    readonly code: RoundErrorCode;
    readonly category: ErrorCategory;
    readonly status: number;
    readonly level: LogLevel;

    constructor(code: RoundErrorCode, message?: string) {
        const definition = ERROR_DEFINITIONS[code];
        super(message ?? definition.message);
        this.name = 'RoundError';
        this.code = code;
        this.category = definition.category;
        this.status = definition.status;
        this.level = definition.level;
    }
}

export function isRoundError(err: unknown): err is RoundError {
    return err instanceof RoundError;
}
