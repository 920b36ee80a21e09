import { ResourceReference } from './types.js'

/**
 * Step of a reconciliation or delete run an error was raised in
 */
export type ReconcilePhase =
  | 'decode'
  | 'inventory'
  | 'stage-one-apply'
  | 'stage-one-wait'
  | 'stage-two-apply'
  | 'stage-two-wait'
  | 'prune'
  | 'delete'

/**
 * A single resource that could not be applied or deleted
 */
export interface ResourceFailure {
  reference: ResourceReference
  message: string
}

/**
 * A resource that had not reached the awaited state when a wait gave up
 */
export interface PendingResource {
  reference: ResourceReference
  status: string
}

export interface ReconcileErrorOptions {
  phase: ReconcilePhase
  cause?: unknown
}

/**
 * Base class of every error the reconciler surfaces to its callers
 */
export class ReconcileError extends Error {
  readonly phase: ReconcilePhase

  constructor(message: string, options: ReconcileErrorOptions) {
    super(message, { cause: options.cause })
    this.name = 'ReconcileError'
    this.phase = options.phase

    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Malformed declaration or inventory input. Nothing was applied.
 */
export class DecodeError extends ReconcileError {
  /** Index of the offending document in a multi-document stream */
  readonly documentIndex?: number

  constructor(
    message: string,
    options: Partial<ReconcileErrorOptions> & { documentIndex?: number } = {}
  ) {
    super(message, { phase: options.phase ?? 'decode', cause: options.cause })
    this.name = 'DecodeError'
    this.documentIndex = options.documentIndex

    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export class ApplyError extends ReconcileError {
  readonly failures: ResourceFailure[]

  constructor(message: string, options: ReconcileErrorOptions) {
    super(message, options)
    this.name = 'ApplyError'
    this.failures = failuresOf(options.cause)

    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * A convergence wait ran past its deadline. Re-running with a longer
 * timeout may succeed.
 */
export class ConvergenceTimeoutError extends ReconcileError {
  readonly pending: PendingResource[]

  constructor(message: string, options: ReconcileErrorOptions) {
    super(message, options)
    this.name = 'ConvergenceTimeoutError'
    this.pending = pendingOf(options.cause)

    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Pruning or an explicit delete failed. `failures` lists the resources whose
 * deletion was rejected; the rest of the batch was deleted.
 */
export class DeleteError extends ReconcileError {
  readonly failures: ResourceFailure[]

  constructor(message: string, options: ReconcileErrorOptions) {
    super(message, options)
    this.name = 'DeleteError'
    this.failures = failuresOf(options.cause)

    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export class TerminationTimeoutError extends ReconcileError {
  readonly pending: PendingResource[]

  constructor(message: string, options: ReconcileErrorOptions) {
    super(message, options)
    this.name = 'TerminationTimeoutError'
    this.pending = pendingOf(options.cause)

    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Raised by a resource manager when some resources of a batch failed
 */
export class ResourceBatchError extends Error {
  readonly failures: ResourceFailure[]

  constructor(operation: string, failures: ResourceFailure[]) {
    super(
      `${operation} failed for ${failures.length} resource(s): ${failures
        .map((f) => `${formatReference(f.reference)}: ${f.message}`)
        .join('; ')}`
    )
    this.name = 'ResourceBatchError'
    this.failures = failures

    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Raised by a resource manager when a wait reaches its deadline
 */
export class WaitTimeoutError extends Error {
  readonly pending: PendingResource[]

  constructor(timeout: number, pending: PendingResource[]) {
    super(
      `timeout after ${timeout}ms waiting for ${pending
        .map((p) => `${formatReference(p.reference)} (${p.status})`)
        .join(', ')}`
    )
    this.name = 'WaitTimeoutError'
    this.pending = pending

    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Renders a reference as `group/kind/namespace/name`, `core` standing in for
 * the empty group.
 */
export function formatReference(reference: ResourceReference): string {
  return [
    reference.group || 'core',
    reference.kind,
    reference.namespace || '-',
    reference.name
  ].join('/')
}

/**
 * Extracts a readable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function failuresOf(cause: unknown): ResourceFailure[] {
  return cause instanceof ResourceBatchError ? cause.failures : []
}

function pendingOf(cause: unknown): PendingResource[] {
  return cause instanceof WaitTimeoutError ? cause.pending : []
}
