/**
 * Metadata fields the reconciler relies on
 */
export interface ObjectMeta {
  /** The name of the Kubernetes object */
  name: string
  /** The namespace where the object is located (absent for cluster-scoped objects) */
  namespace?: string
  labels?: Record<string, string>
  annotations?: Record<string, string>
}

/**
 * A Kubernetes object as declared in a manifest or read back from the cluster.
 * Everything beyond the identifying fields is carried through untouched.
 */
export interface ClusterObject {
  /** The API version of the Kubernetes object */
  apiVersion: string
  /** The kind/type of the Kubernetes object */
  kind: string
  /** Metadata containing object identification information */
  metadata: ObjectMeta
  [field: string]: unknown
}

/**
 * Identifies one cluster resource regardless of its content or served version
 */
export interface ResourceIdentity {
  group: string
  kind: string
  namespace: string
  name: string
}

/**
 * Enough information to address a resource on the API server
 */
export interface ResourceReference extends ResourceIdentity {
  version: string
}

/**
 * Outcome of applying or deleting a single resource
 */
export type ChangeAction =
  | 'created'
  | 'configured'
  | 'unchanged'
  | 'deleted'
  | 'skipped'

export interface ChangeSetEntry {
  reference: ResourceReference
  action: ChangeAction
}

export interface WaitOptions {
  /** Delay between two status polls, in milliseconds */
  interval: number
  /** Deadline for the whole wait, in milliseconds */
  timeout: number
}

export type PropagationPolicy = 'Foreground' | 'Background' | 'Orphan'

export interface DeleteAllOptions {
  propagationPolicy: PropagationPolicy
}

/**
 * Applies, deletes and watches resources on a live cluster.
 * Implementations attempt every resource of a batch and report failures
 * with a ResourceBatchError; waits reject with a WaitTimeoutError.
 */
export interface ResourceManager {
  /**
   * Fills in the namespace the API server would address a namespaced object
   * in when its manifest leaves it out. Other objects are returned as given.
   */
  resolveNamespaces(objects: readonly ClusterObject[]): Promise<ClusterObject[]>
  applyAll(objects: readonly ClusterObject[]): Promise<ChangeSetEntry[]>
  wait(
    references: readonly ResourceReference[],
    options: WaitOptions
  ): Promise<void>
  deleteAll(
    references: readonly ResourceReference[],
    options: DeleteAllOptions
  ): Promise<ChangeSetEntry[]>
  waitForTermination(
    references: readonly ResourceReference[],
    options: WaitOptions
  ): Promise<void>
}

/**
 * Receives plain-text progress messages
 */
export type LogSink = (message: string) => void

export interface ApplyOptions {
  /** Deadline for stage-two convergence and prune termination, in milliseconds */
  waitTimeout?: number
  /** Skip stage-two convergence and termination waits */
  skipWait: boolean
}

export type DeleteOptions = ApplyOptions

/**
 * The two ordered batches a declaration is applied in
 */
export interface ResourceStages {
  /** Namespaces and type definitions other resources may depend on */
  stageOne: ClusterObject[]
  stageTwo: ClusterObject[]
}

/**
 * What one reconciliation run applied and pruned
 */
export interface ReconcileReport {
  stageOne: ResourceReference[]
  stageTwo: ResourceReference[]
  pruned: ResourceReference[]
}
