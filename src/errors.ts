export type AgentErrorCode =
  | 'UNKNOWN_PARAMETER'
  | 'INVALID_PARAMETER'
  | 'CLASSIFICATION_FAILURE'
  | 'GENERATION_FAILURE'
  | 'RECURSION_LIMIT_EXCEEDED'
  | 'RESPONDER_FAILURE'
  | 'STATE_INTEGRITY';

export abstract class AgentError extends Error {
  abstract readonly code: AgentErrorCode;
}

export class UnknownParameterError extends AgentError {
  readonly code = 'UNKNOWN_PARAMETER';
  constructor(public readonly parameter: string, public readonly known: readonly string[]) {
    super(`Unknown parameter "${parameter}". Known parameters: ${known.join(', ')}.`);
    this.name = 'UnknownParameterError';
  }
}

export class InvalidParameterError extends AgentError {
  readonly code = 'INVALID_PARAMETER';
  constructor(
    public readonly parameter: string,
    public readonly value: unknown,
    public readonly reason: string
  ) {
    super(`Invalid value ${JSON.stringify(value)} for ${parameter}: ${reason}.`);
    this.name = 'InvalidParameterError';
  }
}

export type ParameterError = UnknownParameterError | InvalidParameterError;

export class ClassificationFailure extends AgentError {
  readonly code = 'CLASSIFICATION_FAILURE';
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ClassificationFailure';
  }
}

export type GenerationFailureReason = 'non_convergence' | 'invalid_configuration' | 'timeout' | 'internal';

export class GenerationFailure extends AgentError {
  readonly code = 'GENERATION_FAILURE';
  constructor(public readonly reason: GenerationFailureReason, message: string) {
    super(message);
    this.name = 'GenerationFailure';
  }
}

export class RecursionLimitExceeded extends AgentError {
  readonly code = 'RECURSION_LIMIT_EXCEEDED';
  constructor(public readonly limit: number) {
    super(`Follow-up limit of ${limit} chained steps reached; remaining steps were not run.`);
    this.name = 'RecursionLimitExceeded';
  }
}

export class ResponderFailure extends AgentError {
  readonly code = 'RESPONDER_FAILURE';
  constructor(public readonly label: string, message: string) {
    super(message);
    this.name = 'ResponderFailure';
  }
}

/** Caller handed back a state this engine did not produce. Never recovered. */
export class StateIntegrityError extends AgentError {
  readonly code = 'STATE_INTEGRITY';
  constructor(message: string) {
    super(message);
    this.name = 'StateIntegrityError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
