import { RECONCILE } from './constants.js'
import {
  ApplyError,
  ConvergenceTimeoutError,
  DecodeError,
  DeleteError,
  ReconcileError,
  ReconcilePhase,
  TerminationTimeoutError,
  WaitTimeoutError,
  errorMessage,
  formatReference
} from './errors.js'
import { Inventory, toReference } from './inventory.js'
import { decodeManifests } from './manifest-decoder.js'
import { getResourceStages } from './object-classifier.js'
import {
  ApplyOptions,
  ChangeSetEntry,
  ClusterObject,
  DeleteOptions,
  LogSink,
  ResourceManager,
  ResourceReference
} from './types.js'

/**
 * Turns declaration text into objects; decodeManifests unless overridden
 */
export type ObjectDecoder = (text: string) => ClusterObject[]

export interface ReconcilerOptions {
  manager: ResourceManager
  decoder?: ObjectDecoder
  /** Receives progress messages; nothing is logged when omitted */
  log?: LogSink
}

/**
 * Drives a resource manager through apply, convergence and prune.
 *
 * A reconciliation applies stage one (namespaces, custom resource
 * definitions) and waits for it to converge, applies stage two and,
 * unless told to skip waits, waits for it too. When the caller hands back the
 * inventory of the previous run, everything it lists that is no longer
 * declared is deleted last.
 *
 * @example
 * ```typescript
 * const reconciler = new Reconciler({ manager, log: core.info })
 * const first = await reconciler.apply(manifests, { skipWait: false })
 * const second = await reconciler.reconcile(changed, { skipWait: false }, first)
 * ```
 */
export class Reconciler {
  private manager: ResourceManager
  private decode: ObjectDecoder
  private logSink: LogSink

  constructor(options: ReconcilerOptions) {
    this.manager = options.manager
    this.decode = options.decoder ?? decodeManifests
    this.logSink = options.log ?? (() => {})
  }

  /**
   * First-time apply: reconcile without pruning anything.
   */
  async apply(text: string, options: ApplyOptions): Promise<Inventory> {
    return this.reconcile(text, options)
  }

  /**
   * Applies the declaration and prunes what `previous` managed but the
   * declaration no longer contains.
   *
   * @returns the inventory to pass back on the next run
   * @throws {ReconcileError} subclass identifying the failing phase; the
   * cluster may be left partially reconciled and re-running is safe
   */
  async reconcile(
    text: string,
    options: ApplyOptions,
    previous?: Inventory
  ): Promise<Inventory> {
    const waitTimeout = options.waitTimeout ?? RECONCILE.DEFAULT_WAIT_TIMEOUT

    const stages = getResourceStages(this.decodeObjects(text))

    this.log('beginning apply of stage one resources')
    const stageOne = await this.applyStage(stages.stageOne, 'stage-one-apply')

    // stage two may need these namespaces and definitions to exist, so this
    // wait ignores skipWait
    this.log('waiting for stage one resources to reconcile')
    await this.awaitConvergence(
      stageOne,
      RECONCILE.STAGE_ONE_TIMEOUT,
      'stage-one-wait'
    )

    // namespaces of stage two are resolved only now, once the definitions of
    // its custom kinds are served
    this.log('beginning apply of stage two resources')
    const stageTwo = await this.applyStage(stages.stageTwo, 'stage-two-apply')
    const inventory = Inventory.build([...stageOne, ...stageTwo])

    if (!options.skipWait) {
      this.log('waiting for stage two resources to reconcile')
      await this.awaitConvergence(stageTwo, waitTimeout, 'stage-two-wait')
    }

    if (previous) {
      await this.prune(previous, inventory, {
        waitTimeout,
        skipWait: options.skipWait
      })
    }

    return inventory
  }

  /**
   * Deletes every object in the declaration and, unless skipWait is set,
   * waits until they are gone.
   */
  async delete(text: string, options: DeleteOptions): Promise<void> {
    const objects = this.decodeObjects(text)
    let resolved: ClusterObject[]
    try {
      resolved = await this.manager.resolveNamespaces(objects)
    } catch (error) {
      throw new DeleteError(`error deleting resources: ${errorMessage(error)}`, {
        phase: 'delete',
        cause: error
      })
    }
    await this.deleteResources(resolved.map(toReference), options, 'delete')
  }

  private decodeObjects(text: string): ClusterObject[] {
    try {
      return this.decode(text)
    } catch (error) {
      if (error instanceof DecodeError) {
        throw error
      }
      throw new DecodeError(
        `error decoding manifests: ${errorMessage(error)}`,
        { cause: error }
      )
    }
  }

  private async prune(
    previous: Inventory,
    inventory: Inventory,
    options: DeleteOptions
  ): Promise<void> {
    const toRemove = previous.itemsToRemove(inventory)
    if (toRemove.length === 0) {
      return
    }

    this.log('pruning resources')
    await this.deleteResources(toRemove, options, 'prune')
  }

  private async deleteResources(
    references: ResourceReference[],
    options: DeleteOptions,
    phase: ReconcilePhase
  ): Promise<void> {
    const timeout = options.waitTimeout ?? RECONCILE.DEFAULT_WAIT_TIMEOUT

    this.log('beginning delete of resources')
    let changes: ChangeSetEntry[]
    try {
      changes = await this.manager.deleteAll(references, {
        propagationPolicy: 'Foreground'
      })
    } catch (error) {
      throw new DeleteError(
        `error ${phase === 'prune' ? 'pruning' : 'deleting'} resources: ${errorMessage(error)}`,
        { phase, cause: error }
      )
    }
    this.logChanges(changes)

    if (options.skipWait) {
      return
    }

    this.log('waiting for resources to terminate')
    try {
      await this.manager.waitForTermination(references, {
        interval: RECONCILE.POLL_INTERVAL,
        timeout
      })
    } catch (error) {
      if (error instanceof WaitTimeoutError) {
        throw new TerminationTimeoutError(
          `timed out waiting for resources to terminate: ${errorMessage(error)}`,
          { phase, cause: error }
        )
      }
      throw new ReconcileError(
        `error waiting for resources to terminate: ${errorMessage(error)}`,
        { phase, cause: error }
      )
    }
  }

  /**
   * Applies the stage with namespaces resolved and returns the objects as
   * applied.
   */
  private async applyStage(
    objects: ClusterObject[],
    phase: 'stage-one-apply' | 'stage-two-apply'
  ): Promise<ClusterObject[]> {
    let resolved: ClusterObject[]
    let changes: ChangeSetEntry[]
    try {
      resolved = await this.manager.resolveNamespaces(objects)
      changes = await this.manager.applyAll(resolved)
    } catch (error) {
      const stage = phase === 'stage-one-apply' ? 'one' : 'two'
      throw new ApplyError(
        `error applying stage ${stage} resources: ${errorMessage(error)}`,
        { phase, cause: error }
      )
    }
    this.logChanges(changes)
    return resolved
  }

  private async awaitConvergence(
    objects: ClusterObject[],
    timeout: number,
    phase: 'stage-one-wait' | 'stage-two-wait'
  ): Promise<void> {
    try {
      await this.manager.wait(objects.map(toReference), {
        interval: RECONCILE.POLL_INTERVAL,
        timeout
      })
    } catch (error) {
      if (error instanceof WaitTimeoutError) {
        throw new ConvergenceTimeoutError(
          `timed out waiting for objects to reconcile: ${errorMessage(error)}`,
          { phase, cause: error }
        )
      }
      throw new ReconcileError(
        `error waiting for objects to reconcile: ${errorMessage(error)}`,
        { phase, cause: error }
      )
    }
  }

  private logChanges(changes: ChangeSetEntry[]): void {
    for (const change of changes) {
      this.log(`${formatReference(change.reference)} ${change.action}`)
    }
  }

  private log(message: string): void {
    this.logSink(message)
  }
}
