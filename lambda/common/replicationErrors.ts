/**
 * Error classes raised while replicating a KMS key.
 * Everything except ResponseDeliveryError is recovered by the custom resource
 * handler and reported to CloudFormation as FAILED.
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class PolicyRetrievalError extends Error {
  readonly keyId: string;

  constructor(keyId: string, cause?: unknown) {
    super(`Unable to retrieve key policy for "${keyId}": ${describeError(cause)}`, { cause });
    this.name = 'PolicyRetrievalError';
    this.keyId = keyId;
  }
}

export class ReplicationError extends Error {
  readonly keyId: string;
  readonly targetRegion: string;

  constructor(keyId: string, targetRegion: string, cause?: unknown) {
    super(`Unable to replicate "${keyId}" to "${targetRegion}": ${describeError(cause)}`, { cause });
    this.name = 'ReplicationError';
    this.keyId = keyId;
    this.targetRegion = targetRegion;
  }
}

export class ResponseDeliveryError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ResponseDeliveryError';
  }
}

/**
 * Short description of an unknown thrown value, for log lines and error messages
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
