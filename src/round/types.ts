/**
 * Represents a single trivia round.
 */
export type Round = {
  id: number; // Monotonically increasing, 0 is reserved for "no round"
  startedAt: number; // Timestamp of round creation
  entryFee: number; // Cost of a single commitment, in escrow units
  prizeAmount: number; // Payout to the winner
  answerSalt: string; // 32-byte hex salt mixed into every answer hash
  correctAnswerHashes: string[]; // One salted hash per question
  minRevealDelay: number; // ms after commit before a reveal is accepted
  maxRevealDelay: number; // ms after commit at which the commitment expires
  prizeFunded: number; // Escrow balance earmarked for this round
  won: boolean; // Terminal flag, also set by cancellation
  cancelled: boolean;
  winner?: string;
  winnerDisplayName?: string;
  cancelCursor: number; // Index into the player list already force-resolved
};

/**
 * A participant's hidden commitment for a round.
 */
export type CommitInfo = {
  commitHash: string;
  commitTime: number;
  revealed: boolean;
  displayName: string;
};

export type TimingWindow = {
  minRevealDelay: number;
  maxRevealDelay: number;
};

export type StartRoundParams = {
  entryFee: number;
  prizeAmount: number;
  salt: string;
  answerHashes: string[];
  window?: TimingWindow;
};

export type EconomicsParams = {
  entryFee: number;
  prizeAmount: number;
} & TimingWindow;

export type RoundStatus = {
  roundId: number;
  entryFee: number;
  prizeAmount: number;
  prizeFunded: number;
  active: boolean;
  funded: boolean;
  completed: boolean;
  cancelled: boolean;
  winner?: string;
  winnerDisplayName?: string;
  playerCount: number;
  minRevealDelay: number;
  maxRevealDelay: number;
};

export type CommitStatus = {
  present: boolean;
  revealed: boolean;
  expired: boolean;
  commitTime: number;
  displayName: string;
  commitHash: string;
};

export type RevealResult = {
  roundId: number;
  correct: boolean;
  tokenId: number;
  payout: number;
};

export type CancellationProgress = {
  roundId: number;
  affected: number; // Commitments force-resolved by this call
  cursor: number;
  total: number;
  done: boolean;
};

export type PlayerPage = {
  roundId: number;
  total: number;
  offset: number;
  players: string[];
};

/**
 * Notifications emitted by the round engine, keyed by event name.
 */
export type RoundEvents = {
  RoundStarted: { roundId: number; entryFee: number; prizeAmount: number; minRevealDelay: number; maxRevealDelay: number };
  AnswersUpdated: { roundId: number };
  EconomicsUpdated: { roundId: number; entryFee: number; prizeAmount: number; minRevealDelay: number; maxRevealDelay: number };
  PrizeFunded: { roundId: number; amount: number; prizeFunded: number };
  Withdrawn: { to: string; amount: number };
  Committed: { roundId: number; playerId: string; commitHash: string; displayName: string };
  Revealed: { roundId: number; playerId: string; correct: boolean; tokenId: number; displayName: string };
  RevealForfeited: { roundId: number; playerId: string; displayName: string };
  RoundCancelled: { roundId: number; total: number };
  CancellationProgress: CancellationProgress;
  CommitCleared: { roundId: number; playerId: string };
  BanUpdated: { playerId: string; banned: boolean };
};
