import { isRecord } from './manifest-decoder.js'

/**
 * Convergence state of a live resource
 */
export type ResourceStatus =
  | 'Current'
  | 'InProgress'
  | 'Failed'
  | 'Terminating'
  | 'NotFound'

type LiveObject = Record<string, unknown>

type StatusHandler = (
  spec: LiveObject,
  status: LiveObject
) => ResourceStatus

// Kind-specific rollout checks, after the generic generation and condition
// checks have passed.
const kindHandlers: { [kind: string]: StatusHandler } = {
  Deployment: (spec, status) => {
    const replicas = numberField(spec, 'replicas') ?? 1
    if (hasCondition(status, 'Progressing', 'False')) {
      return 'Failed'
    }
    if (
      (numberField(status, 'updatedReplicas') ?? 0) < replicas ||
      (numberField(status, 'availableReplicas') ?? 0) < replicas ||
      (numberField(status, 'replicas') ?? 0) > replicas
    ) {
      return 'InProgress'
    }
    return 'Current'
  },

  StatefulSet: (spec, status) => {
    const replicas = numberField(spec, 'replicas') ?? 1
    if (
      (numberField(status, 'readyReplicas') ?? 0) < replicas ||
      (numberField(status, 'updatedReplicas') ?? 0) < replicas
    ) {
      return 'InProgress'
    }
    return 'Current'
  },

  ReplicaSet: (spec, status) => {
    const replicas = numberField(spec, 'replicas') ?? 1
    if ((numberField(status, 'readyReplicas') ?? 0) < replicas) {
      return 'InProgress'
    }
    return 'Current'
  },

  DaemonSet: (_spec, status) => {
    const desired = numberField(status, 'desiredNumberScheduled')
    if (desired === undefined) {
      return 'InProgress'
    }
    if (
      (numberField(status, 'updatedNumberScheduled') ?? 0) < desired ||
      (numberField(status, 'numberAvailable') ?? 0) < desired
    ) {
      return 'InProgress'
    }
    return 'Current'
  },

  Namespace: (_spec, status) =>
    status.phase === 'Active' ? 'Current' : 'InProgress',

  CustomResourceDefinition: (_spec, status) =>
    hasCondition(status, 'Established', 'True') ? 'Current' : 'InProgress',

  Job: (_spec, status) => {
    if (hasCondition(status, 'Failed', 'True')) {
      return 'Failed'
    }
    if (hasCondition(status, 'Complete', 'True')) {
      return 'Current'
    }
    return 'InProgress'
  },

  PersistentVolumeClaim: (_spec, status) =>
    status.phase === 'Bound' ? 'Current' : 'InProgress'
}

/**
 * Computes whether a live object has converged to its declared state.
 * `undefined` stands for an object the API server no longer knows.
 */
export function computeResourceStatus(
  live: LiveObject | undefined
): ResourceStatus {
  if (!live) {
    return 'NotFound'
  }

  const metadata: LiveObject = isRecord(live.metadata) ? live.metadata : {}
  if (metadata.deletionTimestamp) {
    return 'Terminating'
  }

  const status: LiveObject = isRecord(live.status) ? live.status : {}
  const spec: LiveObject = isRecord(live.spec) ? live.spec : {}

  const generation = numberField(metadata, 'generation')
  const observedGeneration = numberField(status, 'observedGeneration')
  if (
    generation !== undefined &&
    observedGeneration !== undefined &&
    observedGeneration < generation
  ) {
    return 'InProgress'
  }

  if (hasCondition(status, 'Stalled', 'True')) {
    return 'Failed'
  }
  if (hasCondition(status, 'Reconciling', 'True')) {
    return 'InProgress'
  }

  const handler =
    typeof live.kind === 'string' ? kindHandlers[live.kind] : undefined
  if (handler) {
    return handler(spec, status)
  }

  // objects without a rollout phase are current once they exist, unless they
  // report readiness themselves
  if (hasCondition(status, 'Ready', 'False')) {
    return 'InProgress'
  }
  return 'Current'
}

function numberField(object: LiveObject, field: string): number | undefined {
  const value = object[field]
  return typeof value === 'number' ? value : undefined
}

function hasCondition(
  status: LiveObject,
  type: string,
  value: 'True' | 'False'
): boolean {
  const conditions = status.conditions
  if (!Array.isArray(conditions)) {
    return false
  }
  return conditions.some(
    (condition: unknown) =>
      isRecord(condition) &&
      condition.type === type &&
      condition.status === value
  )
}
