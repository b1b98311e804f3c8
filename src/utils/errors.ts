import type { PendingTurn } from '../types';

export class PersonaEngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ProfileValidationError extends PersonaEngineError {
  readonly issues: string[];

  constructor(profileId: string, issues: string[]) {
    super(`Invalid personality profile ${profileId}: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class ProfileNotFoundError extends PersonaEngineError {
  constructor(readonly characterId: string) {
    super(`Personality profile ${characterId} not found`);
  }
}

export class MemoryStoreUnavailableError extends PersonaEngineError {}

export class GenerationError extends PersonaEngineError {
  readonly transient: boolean;

  constructor(message: string, transient: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.transient = transient;
  }

  // Transient failures are safe to retry with the same context bundle
  get retryable(): boolean {
    return this.transient;
  }
}

// Generation failed mid-turn; `pending` carries the exact request so retryTurn can replay it
export class TurnGenerationError extends GenerationError {
  readonly pending: PendingTurn;

  constructor(failure: GenerationError, pending: PendingTurn) {
    super(failure.message, failure.transient, { cause: failure });
    this.pending = pending;
  }
}

export class TurnCancelledError extends PersonaEngineError {
  constructor(characterId: string, userId: string) {
    super(`Turn for ${characterId}/${userId} was cancelled before generation completed`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
