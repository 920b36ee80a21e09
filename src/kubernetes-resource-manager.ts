import * as k8s from '@kubernetes/client-node'
import { setTimeout as sleep } from 'node:timers/promises'
import { KUBERNETES } from './constants.js'
import {
  ResourceBatchError,
  ResourceFailure,
  WaitTimeoutError,
  errorMessage,
  formatReference
} from './errors.js'
import { toApiVersion, toReference } from './inventory.js'
import { isRecord } from './manifest-decoder.js'
import { ResourceStatus, computeResourceStatus } from './resource-status.js'
import {
  ChangeAction,
  ChangeSetEntry,
  ClusterObject,
  DeleteAllOptions,
  LogSink,
  PropagationPolicy,
  ResourceManager,
  ResourceReference,
  WaitOptions
} from './types.js'

/**
 * A live object as returned by the API server
 */
export type LiveObject = Record<string, unknown>

/**
 * Single-object operations against the API server
 */
export interface ObjectClient {
  /** Namespace of the current kubeconfig context, `default` when it has none */
  readonly defaultNamespace: string
  /** Looks the kind up through API discovery */
  isNamespaced(apiVersion: string, kind: string): Promise<boolean>
  /** Server-side applies the object and returns the stored result */
  apply(object: ClusterObject, fieldManager: string): Promise<LiveObject>
  /** Reads the object, resolving to undefined when it does not exist */
  get(reference: ResourceReference): Promise<LiveObject | undefined>
  /** Deletes the object, resolving to false when it was already gone */
  remove(
    reference: ResourceReference,
    propagationPolicy: PropagationPolicy
  ): Promise<boolean>
}

/**
 * Loads a kubeconfig from its YAML content, or from the default locations
 * (KUBECONFIG, ~/.kube/config, in-cluster service account) when none is given.
 */
export function createKubeConfig(kubeconfig?: string): k8s.KubeConfig {
  const kc = new k8s.KubeConfig()
  if (kubeconfig) {
    kc.loadFromString(kubeconfig)
  } else {
    kc.loadFromDefault()
  }
  return kc
}

/**
 * ObjectClient backed by the dynamic object API of @kubernetes/client-node
 */
export class KubernetesObjectClient implements ObjectClient {
  readonly defaultNamespace: string
  private api: k8s.KubernetesObjectApi

  constructor(kubeConfig: k8s.KubeConfig) {
    this.api = k8s.KubernetesObjectApi.makeApiClient(kubeConfig)
    this.defaultNamespace =
      kubeConfig.getContextObject(kubeConfig.getCurrentContext())?.namespace ||
      'default'
  }

  async isNamespaced(apiVersion: string, kind: string): Promise<boolean> {
    const resource = await this.api.resource(apiVersion, kind)
    if (!resource) {
      throw new Error(`the server does not serve ${kind} in ${apiVersion}`)
    }
    return resource.namespaced
  }

  async apply(object: ClusterObject, fieldManager: string): Promise<LiveObject> {
    const { body } = await this.api.patch(
      object,
      undefined,
      undefined,
      fieldManager,
      true,
      { headers: { 'Content-Type': KUBERNETES.APPLY_PATCH_CONTENT_TYPE } }
    )
    return asLiveObject(body)
  }

  async get(reference: ResourceReference): Promise<LiveObject | undefined> {
    try {
      const { body } = await this.api.read(toHeader(reference))
      return asLiveObject(body)
    } catch (error) {
      if (isNotFound(error)) {
        return undefined
      }
      throw error
    }
  }

  async remove(
    reference: ResourceReference,
    propagationPolicy: PropagationPolicy
  ): Promise<boolean> {
    try {
      await this.api.delete(
        toHeader(reference),
        undefined,
        undefined,
        undefined,
        undefined,
        propagationPolicy
      )
      return true
    } catch (error) {
      if (isNotFound(error)) {
        return false
      }
      throw error
    }
  }
}

/**
 * Builds a manager talking to the cluster described by `kubeconfig`, or by the
 * default kubeconfig locations when it is empty.
 */
export function createResourceManager(options: {
  kubeconfig?: string
  fieldManager?: string
  log?: LogSink
}): ResourceManager {
  return new KubernetesResourceManager({
    client: new KubernetesObjectClient(createKubeConfig(options.kubeconfig)),
    fieldManager: options.fieldManager,
    log: options.log
  })
}

export interface KubernetesResourceManagerOptions {
  client: ObjectClient
  /** Field manager recorded on applied objects */
  fieldManager?: string
  /** Receives per-resource detail, typically routed to debug output */
  log?: LogSink
}

/**
 * Applies and deletes batches of objects concurrently and polls their status
 * until they converge or disappear.
 */
export class KubernetesResourceManager implements ResourceManager {
  private client: ObjectClient
  private fieldManager: string
  private log: LogSink

  constructor(options: KubernetesResourceManagerOptions) {
    this.client = options.client
    this.fieldManager = options.fieldManager || KUBERNETES.DEFAULT_FIELD_MANAGER
    this.log = options.log ?? (() => {})
  }

  async resolveNamespaces(
    objects: readonly ClusterObject[]
  ): Promise<ClusterObject[]> {
    return this.runBatch(
      'namespace lookup',
      objects.map((object) => ({
        reference: toReference(object),
        run: async (): Promise<ClusterObject> => {
          if (
            object.metadata.namespace ||
            !(await this.client.isNamespaced(object.apiVersion, object.kind))
          ) {
            return object
          }
          return {
            ...object,
            metadata: {
              ...object.metadata,
              namespace: this.client.defaultNamespace
            }
          }
        }
      }))
    )
  }

  async applyAll(objects: readonly ClusterObject[]): Promise<ChangeSetEntry[]> {
    return this.runBatch(
      'apply',
      objects.map((object) => ({
        reference: toReference(object),
        run: () => this.apply(object)
      }))
    )
  }

  async deleteAll(
    references: readonly ResourceReference[],
    options: DeleteAllOptions
  ): Promise<ChangeSetEntry[]> {
    return this.runBatch(
      'delete',
      references.map((reference) => ({
        reference,
        run: async (): Promise<ChangeSetEntry> => {
          const deleted = await this.client.remove(
            reference,
            options.propagationPolicy
          )
          const action: ChangeAction = deleted ? 'deleted' : 'skipped'
          this.log(`${formatReference(reference)} ${action}`)
          return { reference, action }
        }
      }))
    )
  }

  async wait(
    references: readonly ResourceReference[],
    options: WaitOptions
  ): Promise<void> {
    return this.poll(references, options, (status) => status === 'Current')
  }

  async waitForTermination(
    references: readonly ResourceReference[],
    options: WaitOptions
  ): Promise<void> {
    return this.poll(references, options, (status) => status === 'NotFound')
  }

  private async apply(object: ClusterObject): Promise<ChangeSetEntry> {
    const reference = toReference(object)
    const existing = await this.client.get(reference)
    const applied = await this.client.apply(object, this.fieldManager)

    let action: ChangeAction = 'created'
    if (existing) {
      action =
        resourceVersionOf(existing) === resourceVersionOf(applied)
          ? 'unchanged'
          : 'configured'
    }

    this.log(`${formatReference(reference)} ${action}`)
    return { reference, action }
  }

  /**
   * Runs every operation of a batch, then fails with all the rejected ones.
   */
  private async runBatch<T>(
    operation: string,
    tasks: { reference: ResourceReference; run: () => Promise<T> }[]
  ): Promise<T[]> {
    const results = await Promise.allSettled(tasks.map((task) => task.run()))

    const entries: T[] = []
    const failures: ResourceFailure[] = []
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        entries.push(result.value)
      } else {
        failures.push({
          reference: tasks[index].reference,
          message: errorMessage(result.reason)
        })
      }
    })

    if (failures.length > 0) {
      throw new ResourceBatchError(operation, failures)
    }
    return entries
  }

  private async poll(
    references: readonly ResourceReference[],
    options: WaitOptions,
    isDone: (status: PollStatus) => boolean
  ): Promise<void> {
    const deadline = Date.now() + options.timeout
    let pending = [...references]

    for (;;) {
      const statuses = await Promise.all(
        pending.map((reference) => this.readStatus(reference))
      )
      const waiting = statuses.filter((s) => !isDone(s.status))
      if (waiting.length === 0) {
        return
      }
      if (Date.now() >= deadline) {
        throw new WaitTimeoutError(options.timeout, waiting)
      }

      this.log(
        `waiting on ${waiting
          .map((s) => `${formatReference(s.reference)} (${s.status})`)
          .join(', ')}`
      )
      pending = waiting.map((s) => s.reference)
      await sleep(options.interval)
    }
  }

  /**
   * A failed read leaves the resource pending as Unknown until the deadline.
   */
  private async readStatus(
    reference: ResourceReference
  ): Promise<{ reference: ResourceReference; status: PollStatus }> {
    try {
      const live = await this.client.get(reference)
      return { reference, status: computeResourceStatus(live) }
    } catch (error) {
      this.log(
        `reading ${formatReference(reference)} failed: ${errorMessage(error)}`
      )
      return { reference, status: 'Unknown' }
    }
  }
}

type PollStatus = ResourceStatus | 'Unknown'

function toHeader(reference: ResourceReference): {
  apiVersion: string
  kind: string
  metadata: { name: string; namespace: string }
} {
  return {
    apiVersion: toApiVersion(reference),
    kind: reference.kind,
    metadata: { name: reference.name, namespace: reference.namespace }
  }
}

function asLiveObject(value: unknown): LiveObject {
  return isRecord(value) ? value : {}
}

function resourceVersionOf(object: LiveObject): unknown {
  return isRecord(object.metadata) ? object.metadata.resourceVersion : undefined
}

function isNotFound(error: unknown): boolean {
  return error instanceof k8s.HttpError && error.statusCode === 404
}
