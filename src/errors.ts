/**
 * Error taxonomy for the control orchestrator.
 *
 * Only ResourceError, InvalidStateError and InvalidConfigError reach callers as failures.
 * Agent and extraction faults are recovered inside the control loop.
 */

export type OrchestratorErrorCode =
  | 'RESOURCE'
  | 'INVALID_STATE'
  | 'INVALID_ACTION'
  | 'INVALID_CONFIG'
  | 'AGENT'
  | 'AGENT_TIMEOUT'
  | 'STATE_EXTRACTION';

export class OrchestratorError extends Error {
  readonly code: OrchestratorErrorCode;

  constructor(code: OrchestratorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OrchestratorError';
    this.code = code;
  }
}

/** ROM image missing, unreadable or malformed. Fatal to `start()`. */
export class ResourceError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RESOURCE', message, options);
    this.name = 'ResourceError';
  }
}

/** Operation requested in the wrong session status. */
export class InvalidStateError extends OrchestratorError {
  constructor(message: string) {
    super('INVALID_STATE', message);
    this.name = 'InvalidStateError';
  }
}

export class InvalidActionError extends OrchestratorError {
  readonly token: string;

  constructor(token: string) {
    super('INVALID_ACTION', `Unknown action: ${JSON.stringify(token)}`);
    this.name = 'InvalidActionError';
    this.token = token;
  }
}

export class InvalidConfigError extends OrchestratorError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
    this.name = 'InvalidConfigError';
  }
}

/** Decision backend failure: transport error, malformed reply, cancellation. */
export class AgentError extends OrchestratorError {
  readonly agentId: string;

  constructor(
    agentId: string,
    message: string,
    options?: { cause?: unknown },
    code: 'AGENT' | 'AGENT_TIMEOUT' = 'AGENT',
  ) {
    super(code, message, options);
    this.name = 'AgentError';
    this.agentId = agentId;
  }
}

export class AgentTimeoutError extends AgentError {
  readonly timeoutMs: number;

  constructor(agentId: string, timeoutMs: number) {
    super(agentId, `Agent ${agentId} did not answer within ${timeoutMs}ms`, undefined, 'AGENT_TIMEOUT');
    this.name = 'AgentTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** Transient invalid memory read. Logged, never thrown to callers. */
export class StateExtractionWarning extends OrchestratorError {
  readonly violations: string[];

  constructor(violations: string[]) {
    super('STATE_EXTRACTION', `Discarded snapshot: ${violations.join('; ')}`);
    this.name = 'StateExtractionWarning';
    this.violations = violations;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
