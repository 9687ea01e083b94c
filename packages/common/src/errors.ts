import * as grpc from '@grpc/grpc-js'

/**
 * Base class for every error this project raises on purpose.
 */
export class CrashGridError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** Invalid cluster configuration or command-line arguments. */
export class ConfigError extends CrashGridError {}

/**
 * A shard file that cannot be loaded. Fatal at worker startup.
 */
export class IngestionError extends CrashGridError {
  public constructor(
    message: string,
    public readonly path: string,
    public readonly line?: number
  ) {
    super(line == null ? `${path}: ${message}` : `${path}:${line}: ${message}`)
  }
}

/**
 * A query rejected before any shard is contacted.
 */
export class QueryError extends CrashGridError {}

export class UnknownVerbError extends QueryError {
  public constructor(public readonly verb: string) {
    super(`Unknown query: ${verb}`)
  }
}

export class ArityError extends QueryError {
  public constructor(
    public readonly verb: string,
    public readonly expected: number,
    public readonly received: number
  ) {
    super(`${verb} expects ${expected} parameter(s), got ${received}`)
  }
}

export class InvalidParameterError extends QueryError {}

/**
 * A worker that timed out or failed at the transport level. Degrades the
 * query to partial results.
 */
export class WorkerUnavailableError extends CrashGridError {
  public constructor(
    public readonly workerId: string,
    reason: string
  ) {
    super(`worker ${workerId}: ${reason}`)
  }
}

/**
 * The remote end of a call could not be reached or answered with a gRPC
 * error status.
 */
export class TransportError extends CrashGridError {
  public constructor(
    message: string,
    public readonly code: grpc.status
  ) {
    super(message)
  }
}

/**
 * A DataMessage the receiving process refused or could not pass on.
 */
export class DeliveryError extends CrashGridError {
  public constructor(
    message: string,
    public readonly code: grpc.status
  ) {
    super(message)
  }
}

/** A payload that does not match the wire schema. */
export class WireFormatError extends CrashGridError {}

export const createServiceError = (message: string, code: grpc.status): grpc.ServiceError => {
  return Object.assign(new Error(message), {
    code,
    details: message,
    metadata: new grpc.Metadata(),
  })
}

export const errorMessage = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error)
}
