export type GridErrorCode =
  | 'UNKNOWN_PARTICIPANT'
  | 'UNKNOWN_NODE'
  | 'NODE_ID_COLLISION'
  | 'INVALID_ENVELOPE'
  | 'RUN_NOT_STARTED'
  | 'RUN_ALREADY_STARTED'
  | 'INVALID_ARGUMENT'
  | 'SUBMIT_FAILED'
  | 'CORRUPT_ENVELOPE'
  | 'MISSING_KEY'
  | 'KEY_PARAMETER'
  | 'CRYPTO_FAILED'
  | 'TRANSPORT_FAILED'
  | 'INVALID_CONFIG';

export class GridError extends Error {
  readonly code: GridErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: GridErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'GridError';
    this.code = code;
    this.context = context;
  }
}

export class UnknownParticipantError extends GridError {
  constructor(address: string) {
    super('UNKNOWN_PARTICIPANT', `Unknown participant address: ${address}`, { address });
    this.name = 'UnknownParticipantError';
  }
}

export class UnknownNodeError extends GridError {
  constructor(nodeId: number) {
    super('UNKNOWN_NODE', `Node ${nodeId} is not in the participant set`, { nodeId });
    this.name = 'UnknownNodeError';
  }
}

export class NodeIdCollisionError extends GridError {
  constructor(nodeId: number, first: string, second: string) {
    super('NODE_ID_COLLISION', `Addresses "${first}" and "${second}" both map to node ${nodeId}`, {
      nodeId,
      addresses: [first, second],
    });
    this.name = 'NodeIdCollisionError';
  }
}

export class InvalidEnvelopeError extends GridError {
  readonly violations: string[];

  constructor(violations: string[]) {
    super('INVALID_ENVELOPE', `Invalid envelope: ${violations.join(', ')}`, { violations });
    this.name = 'InvalidEnvelopeError';
    this.violations = violations;
  }
}

export class RunNotStartedError extends GridError {
  constructor() {
    super('RUN_NOT_STARTED', 'No run has been started. Call startRun() first.');
    this.name = 'RunNotStartedError';
  }
}

export class RunAlreadyStartedError extends GridError {
  constructor(runId: number) {
    super('RUN_ALREADY_STARTED', `Run ${runId} is already started`, { runId });
    this.name = 'RunAlreadyStartedError';
  }
}

export class InvalidArgumentError extends GridError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('INVALID_ARGUMENT', message, context);
    this.name = 'InvalidArgumentError';
  }
}

export class SubmitError extends GridError {
  constructor(address: string, cause: unknown) {
    super('SUBMIT_FAILED', `Failed to submit message to ${address}: ${describeError(cause)}`, { address });
    this.name = 'SubmitError';
  }
}

export class CorruptEnvelopeError extends GridError {
  constructor(message: string) {
    super('CORRUPT_ENVELOPE', message);
    this.name = 'CorruptEnvelopeError';
  }
}

export class MissingKeyError extends GridError {
  constructor(address: string) {
    super('MISSING_KEY', `No encryption key known for ${address}`, { address });
    this.name = 'MissingKeyError';
  }
}

export class KeyParameterError extends GridError {
  constructor(address: string, message: string) {
    super('KEY_PARAMETER', `Unusable encryption key for ${address}: ${message}`, { address });
    this.name = 'KeyParameterError';
  }
}

export class InvalidConfigError extends GridError {
  constructor(name: string, value: string) {
    super('INVALID_CONFIG', `Invalid value for ${name}: "${value}"`, { name, value });
    this.name = 'InvalidConfigError';
  }
}

/** Key material errors let the transport adapter fall back to plaintext. */
export function isKeyMaterialError(error: unknown): error is MissingKeyError | KeyParameterError {
  return error instanceof GridError && (error.code === 'MISSING_KEY' || error.code === 'KEY_PARAMETER');
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
