import {
  ResourceBatchError,
  ResourceFailure,
  WaitTimeoutError
} from '../src/errors.js'
import { identityKey, toReference } from '../src/inventory.js'
import {
  ChangeSetEntry,
  ClusterObject,
  DeleteAllOptions,
  ResourceManager,
  ResourceReference,
  WaitOptions
} from '../src/types.js'

export type ManagerCall =
  | { op: 'applyAll'; names: string[] }
  | { op: 'wait'; names: string[]; options: WaitOptions }
  | { op: 'deleteAll'; names: string[]; options: DeleteAllOptions }
  | { op: 'waitForTermination'; names: string[]; options: WaitOptions }

/**
 * Resource manager keeping a cluster in memory and recording every call
 */
export class FakeResourceManager implements ResourceManager {
  readonly calls: ManagerCall[] = []
  readonly cluster = new Map<string, ResourceReference>()

  /** Names (kind/name) whose apply or delete is rejected */
  rejected = new Set<string>()
  /** Names (kind/name) that never converge */
  stuck = new Set<string>()
  /** Names (kind/name) that never finish terminating */
  lingering = new Set<string>()
  /** Thrown by both waits instead of polling, when set */
  waitFailure?: Error
  /** Kinds served without a namespace */
  clusterScoped = new Set([
    'Namespace',
    'CustomResourceDefinition',
    'ClusterRole'
  ])
  defaultNamespace = 'default'

  async resolveNamespaces(
    objects: readonly ClusterObject[]
  ): Promise<ClusterObject[]> {
    return objects.map((object) =>
      object.metadata.namespace || this.clusterScoped.has(object.kind)
        ? object
        : {
            ...object,
            metadata: { ...object.metadata, namespace: this.defaultNamespace }
          }
    )
  }

  async applyAll(objects: readonly ClusterObject[]): Promise<ChangeSetEntry[]> {
    const references = objects.map(toReference)
    this.calls.push({ op: 'applyAll', names: references.map(nameOf) })

    this.rejectListed('apply', references)
    return references.map((reference): ChangeSetEntry => {
      const key = identityKey(reference)
      const action = this.cluster.has(key) ? 'unchanged' : 'created'
      this.cluster.set(key, reference)
      return { reference, action }
    })
  }

  async wait(
    references: readonly ResourceReference[],
    options: WaitOptions
  ): Promise<void> {
    this.calls.push({ op: 'wait', names: references.map(nameOf), options })
    if (this.waitFailure) {
      throw this.waitFailure
    }

    const pending = references.filter((r) => this.stuck.has(nameOf(r)))
    if (pending.length > 0) {
      throw new WaitTimeoutError(
        options.timeout,
        pending.map((reference) => ({ reference, status: 'InProgress' }))
      )
    }
  }

  async deleteAll(
    references: readonly ResourceReference[],
    options: DeleteAllOptions
  ): Promise<ChangeSetEntry[]> {
    this.calls.push({ op: 'deleteAll', names: references.map(nameOf), options })

    this.rejectListed('delete', references)
    return references.map((reference): ChangeSetEntry => {
      const existed = this.cluster.delete(identityKey(reference))
      return { reference, action: existed ? 'deleted' : 'skipped' }
    })
  }

  async waitForTermination(
    references: readonly ResourceReference[],
    options: WaitOptions
  ): Promise<void> {
    this.calls.push({
      op: 'waitForTermination',
      names: references.map(nameOf),
      options
    })
    if (this.waitFailure) {
      throw this.waitFailure
    }

    const pending = references.filter((r) => this.lingering.has(nameOf(r)))
    if (pending.length > 0) {
      throw new WaitTimeoutError(
        options.timeout,
        pending.map((reference) => ({ reference, status: 'Terminating' }))
      )
    }
  }

  /** kind/name of everything currently in the cluster, sorted */
  liveNames(): string[] {
    return [...this.cluster.values()].map(nameOf).sort()
  }

  operations(): string[] {
    return this.calls.map((call) => `${call.op} ${call.names.join(',')}`)
  }

  private rejectListed(
    operation: string,
    references: readonly ResourceReference[]
  ): void {
    const failures: ResourceFailure[] = references
      .filter((reference) => this.rejected.has(nameOf(reference)))
      .map((reference) => ({ reference, message: 'rejected by fake' }))
    if (failures.length > 0) {
      throw new ResourceBatchError(operation, failures)
    }
  }
}

export function nameOf(reference: ResourceReference): string {
  return `${reference.kind}/${reference.name}`
}
