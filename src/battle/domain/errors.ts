export class BattleError extends Error {
  constructor(message: string, public code: string, public statusCode: number = 400) {
    super(message);
  }
}

export class NotFoundError extends BattleError {
  constructor(message: string) {
    super(message, "NOT_FOUND", 404);
  }
}

export class ConflictError extends BattleError {
  constructor(message: string) {
    super(message, "CONFLICT", 409);
  }
}

export class ValidationError extends BattleError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR", 400);
  }
}

export class DomainError extends BattleError {
  constructor(message: string) {
    super(message, "DOMAIN_ERROR", 400);
  }
}

// ---- async turn control (never leaves the core) ----

export class TurnTimeoutError extends Error {
  constructor(public readonly unitId: string, public readonly timeoutMs: number) {
    super(`turn of ${unitId} exceeded ${timeoutMs}ms`);
  }
}

export class TurnCancelledError extends Error {
  constructor(message = "turn cancelled") {
    super(message);
  }
}
