export class AppError extends Error {
  readonly code: string;

  constructor(message: string, code = 'APP_ERROR') {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, code = 'VALIDATION_FAILED') {
    super(message, code);
  }
}

/**
 * Raised both for missing entities and for entities owned by another user,
 * with the same message, so callers learn nothing about other users' data.
 */
export class NotFoundError extends AppError {
  constructor(message: string, code = 'NOT_FOUND') {
    super(message, code);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code = 'CONFLICT') {
    super(message, code);
  }
}

/** A request that does not fit the entity's current lifecycle state. */
export class StateError extends AppError {
  constructor(message: string, code = 'INVALID_STATE') {
    super(message, code);
  }
}

// Session tracker

export class SessionAlreadyActiveError extends ConflictError {
  constructor(readonly activeSessionId: string) {
    super(`An active session already exists: ${activeSessionId}`, 'SESSION_ALREADY_ACTIVE');
  }
}

export class SessionNotActiveError extends StateError {
  constructor(sessionId: string) {
    super(`Session ${sessionId} has already ended`, 'SESSION_NOT_ACTIVE');
  }
}

export class IntervalStateError extends StateError {
  constructor(message: string) {
    super(message, 'INTERVAL_INVALID_STATE');
  }
}

export class BreakAlreadyCompletedError extends ConflictError {
  constructor(breakId: string) {
    super(`Break ${breakId} is already completed`, 'BREAK_ALREADY_COMPLETED');
  }
}

export class BreakStateError extends StateError {
  constructor(message: string) {
    super(message, 'BREAK_INVALID_STATE');
  }
}

export class DailyLimitExceededError extends AppError {
  constructor(readonly intervalsToday: number, readonly dailyLimit: number) {
    super(
      `Daily limit of ${dailyLimit} intervals reached. Upgrade to premium for unlimited intervals.`,
      'DAILY_LIMIT_EXCEEDED'
    );
  }
}

// Progression

export class ChallengeClosedError extends StateError {
  constructor(challengeId: string) {
    super(`Challenge ${challengeId} has already closed`, 'CHALLENGE_CLOSED');
  }
}

export class ChallengeAlreadyJoinedError extends ConflictError {
  constructor(challengeId: string) {
    super(`Already joined challenge ${challengeId}`, 'CHALLENGE_ALREADY_JOINED');
  }
}

// Infrastructure

export class ConcurrencyConflictError extends AppError {
  constructor(key: string) {
    super(`Concurrent update detected for ${key}`, 'CONCURRENCY_CONFLICT');
  }
}

export class TransientError extends AppError {
  constructor(message: string, readonly reason?: unknown) {
    super(message, 'TRANSIENT_FAILURE');
  }
}
