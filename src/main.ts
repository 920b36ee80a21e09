import * as fs from 'fs'
import * as core from '@actions/core'
import { GitHubPRCommenter } from './github-pr-commenter.js'
import { COMMENTS, GITHUB, KUBERNETES } from './constants.js'
import { ReconcileError } from './errors.js'
import { readInventory, writeInventory } from './inventory-store.js'
import { createResourceManager } from './kubernetes-resource-manager.js'
import { isClusterDefinitionIdentity } from './object-classifier.js'
import { Reconciler } from './reconciler.js'
import { ApplyOptions, ReconcileReport } from './types.js'

type Mode = 'reconcile' | 'delete'

export async function run(): Promise<void> {
  try {
    const manifestsPath = core.getInput('manifests_path', { required: true })
    const mode = parseMode(core.getInput('mode'))
    const kubeconfig = core.getInput('kubeconfig')
    const previousInventoryPath = core.getInput('previous_inventory_path')
    const inventoryPath =
      core.getInput('inventory_path') || previousInventoryPath
    const options: ApplyOptions = {
      waitTimeout: parseWaitTimeout(core.getInput('wait_timeout')),
      skipWait: core.getBooleanInput('skip_wait')
    }
    const fieldManager =
      core.getInput('field_manager') || KUBERNETES.DEFAULT_FIELD_MANAGER
    const githubToken = core.getInput('github_token')
    const maxCommentLength = parseMaxCommentLength(
      core.getInput('max_comment_char_len')
    )

    if (kubeconfig) {
      core.setSecret(kubeconfig)
    }

    const manifests = await fs.promises.readFile(manifestsPath, 'utf8')
    const reconciler = new Reconciler({
      manager: createResourceManager({
        kubeconfig,
        fieldManager,
        log: core.debug
      }),
      log: core.info
    })

    if (mode === 'delete') {
      core.info(`Deleting resources declared in ${manifestsPath}`)
      await reconciler.delete(manifests, options)
      return
    }

    const previous = previousInventoryPath
      ? await readInventory(previousInventoryPath)
      : undefined
    core.info(
      previous
        ? `Reconciling ${manifestsPath} against ${previous.size} previously applied resources`
        : `Applying ${manifestsPath} without a previous inventory`
    )

    const inventory = await reconciler.reconcile(manifests, options, previous)
    const pruned = previous ? previous.itemsToRemove(inventory) : []

    if (inventoryPath) {
      await writeInventory(inventoryPath, inventory)
      core.info(`Wrote inventory of ${inventory.size} resources to ${inventoryPath}`)
    }

    core.setOutput('inventory', JSON.stringify(inventory))
    core.setOutput('applied_count', inventory.size)
    core.setOutput('pruned_count', pruned.length)

    const report: ReconcileReport = {
      stageOne: inventory.items.filter(isClusterDefinitionIdentity),
      stageTwo: inventory.items.filter(
        (item) => !isClusterDefinitionIdentity(item)
      ),
      pruned
    }
    if (githubToken) {
      const commenter = new GitHubPRCommenter(
        githubToken,
        core.getInput('title') || COMMENTS.DEFAULT_TITLE,
        core.getInput('subtitle'),
        maxCommentLength
      )
      await commenter.postReport(report)
    } else {
      core.info(
        `Reconciled ${inventory.size} resources, pruned ${pruned.length}`
      )
    }
  } catch (error) {
    core.setFailed(`Action failed with error: ${describeError(error)}`)
  }
}

function parseMode(value: string): Mode {
  if (!value || value === 'reconcile') {
    return 'reconcile'
  }
  if (value === 'delete') {
    return 'delete'
  }
  throw new Error(`Unsupported mode "${value}", expected reconcile or delete`)
}

/**
 * Reads the wait_timeout input, given in seconds, as milliseconds.
 */
function parseWaitTimeout(value: string): number | undefined {
  if (!value) {
    return undefined
  }
  const seconds = Number(value)
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(
      `Invalid wait_timeout "${value}", expected a positive number of seconds`
    )
  }
  return seconds * 1000
}

function parseMaxCommentLength(value: string): number {
  if (!value) {
    return GITHUB.MAX_COMMENT_LENGTH
  }
  const length = Number(value)
  if (!Number.isInteger(length) || length <= 0) {
    throw new Error(
      `Invalid max_comment_char_len "${value}", expected a positive integer`
    )
  }
  return length
}

function describeError(error: unknown): string {
  if (error instanceof ReconcileError) {
    return `${error.name} during ${error.phase}: ${error.message}`
  }
  return `${error}`
}
