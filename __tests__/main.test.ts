/**
 * Unit tests for the action's main functionality, src/main.ts
 */
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { jest } from '@jest/globals'
import * as core from '../__fixtures__/core.js'
import { FakeResourceManager } from '../__fixtures__/resource-manager.js'
import { InventoryDocument } from '../src/inventory.js'
import type { createResourceManager } from '../src/kubernetes-resource-manager.js'
import { run } from '../src/main.js'

jest.mock('@actions/core', () => jest.requireActual('../__fixtures__/core'))

const mockCreateResourceManager = jest.fn<typeof createResourceManager>()
jest.mock('../src/kubernetes-resource-manager', () => ({
  createResourceManager: (
    ...args: Parameters<typeof createResourceManager>
  ) => mockCreateResourceManager(...args)
}))

const mockListComments = jest.fn<(params: object) => Promise<{ data: [] }>>()
const mockCreateComment = jest.fn<(params: object) => Promise<object>>()
const mockGraphql =
  jest.fn<(query: string, variables: object) => Promise<object>>()

const mockOctokit = {
  graphql: mockGraphql,
  rest: {
    issues: {
      listComments: mockListComments,
      createComment: mockCreateComment
    }
  }
}

jest.mock('@actions/github', () => ({
  context: {
    repo: {
      owner: 'test-owner',
      repo: 'test-repo'
    },
    payload: {
      pull_request: {
        number: 1
      }
    }
  },
  getOctokit: () => mockOctokit
}))

const manifests = `apiVersion: v1
kind: Namespace
metadata:
  name: team-a
---
apiVersion: v1
kind: ConfigMap
metadata:
  name: settings
  namespace: team-a
data:
  key: value
`

describe('main.ts', () => {
  let dir: string
  let manager: FakeResourceManager
  let inputs: Record<string, string>

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'reconcile-'))
    await fs.promises.writeFile(path.join(dir, 'manifests.yaml'), manifests)

    manager = new FakeResourceManager()
    mockCreateResourceManager.mockReturnValue(manager)

    inputs = {
      manifests_path: path.join(dir, 'manifests.yaml'),
      inventory_path: path.join(dir, 'inventory.json')
    }
    core.getInput.mockImplementation((name: string) => inputs[name] ?? '')
    core.getBooleanInput.mockReturnValue(false)

    mockListComments.mockResolvedValue({ data: [] })
    mockCreateComment.mockResolvedValue({})
    mockGraphql.mockResolvedValue({})
  })

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true })
  })

  it('applies the manifests and records the inventory', async () => {
    await run()

    expect(core.setFailed).not.toHaveBeenCalled()
    expect(manager.operations()).toEqual([
      'applyAll Namespace/team-a',
      'wait Namespace/team-a',
      'applyAll ConfigMap/settings',
      'wait ConfigMap/settings'
    ])
    expect(core.info).toHaveBeenCalledWith(
      `Applying ${inputs.manifests_path} without a previous inventory`
    )
    expect(core.setOutput).toHaveBeenCalledWith('applied_count', 2)
    expect(core.setOutput).toHaveBeenCalledWith('pruned_count', 0)
    expect(core.info).toHaveBeenCalledWith('Reconciled 2 resources, pruned 0')

    const written: InventoryDocument = JSON.parse(
      await fs.promises.readFile(inputs.inventory_path, 'utf8')
    )
    expect(written.items.map((item) => item.name)).toEqual([
      'team-a',
      'settings'
    ])
  })

  it('builds the resource manager from the inputs', async () => {
    inputs.kubeconfig = 'apiVersion: v1\nkind: Config\n'
    inputs.field_manager = 'ci'

    await run()

    expect(core.setSecret).toHaveBeenCalledWith(inputs.kubeconfig)
    expect(mockCreateResourceManager).toHaveBeenCalledWith({
      kubeconfig: inputs.kubeconfig,
      fieldManager: 'ci',
      log: core.debug
    })
  })

  it('prunes what the previous inventory holds and the manifests no longer declare', async () => {
    const previousPath = path.join(dir, 'previous.json')
    await fs.promises.writeFile(
      previousPath,
      JSON.stringify({
        items: [
          {
            group: '',
            kind: 'Namespace',
            version: 'v1',
            namespace: '',
            name: 'team-a'
          },
          {
            group: '',
            kind: 'ConfigMap',
            version: 'v1',
            namespace: 'team-a',
            name: 'stale'
          }
        ]
      })
    )
    inputs = {
      manifests_path: inputs.manifests_path,
      previous_inventory_path: previousPath
    }

    await run()

    expect(manager.operations().slice(-2)).toEqual([
      'deleteAll ConfigMap/stale',
      'waitForTermination ConfigMap/stale'
    ])
    expect(core.setOutput).toHaveBeenCalledWith('pruned_count', 1)
    expect(core.info).toHaveBeenCalledWith(
      `Reconciling ${inputs.manifests_path} against 2 previously applied resources`
    )

    const written: InventoryDocument = JSON.parse(
      await fs.promises.readFile(previousPath, 'utf8')
    )
    expect(written.items).toHaveLength(2)
    expect(written.items[1].name).toBe('settings')
  })

  it('skips convergence of stage two when asked to', async () => {
    core.getBooleanInput.mockReturnValue(true)

    await run()

    expect(manager.operations()).toEqual([
      'applyAll Namespace/team-a',
      'wait Namespace/team-a',
      'applyAll ConfigMap/settings'
    ])
  })

  it('passes wait_timeout on in milliseconds', async () => {
    inputs.wait_timeout = '90'

    await run()

    expect(manager.calls[3]).toEqual({
      op: 'wait',
      names: ['ConfigMap/settings'],
      options: { interval: 2_000, timeout: 90_000 }
    })
  })

  it('deletes the declared resources in delete mode', async () => {
    inputs.mode = 'delete'

    await run()

    expect(core.info).toHaveBeenCalledWith(
      `Deleting resources declared in ${inputs.manifests_path}`
    )
    expect(manager.operations()).toEqual([
      'deleteAll Namespace/team-a,ConfigMap/settings',
      'waitForTermination Namespace/team-a,ConfigMap/settings'
    ])
    expect(core.setOutput).not.toHaveBeenCalled()
  })

  it('posts the report on the pull request when a token is given', async () => {
    inputs.github_token = 'test-token'

    await run()

    expect(mockCreateComment).toHaveBeenCalledTimes(1)
    expect(mockCreateComment).toHaveBeenCalledWith(
      expect.objectContaining({
        owner: 'test-owner',
        repo: 'test-repo',
        issue_number: 1,
        body: expect.stringContaining('- `core/ConfigMap/team-a/settings`')
      })
    )
  })

  it('fails the action with the phase of a rejected apply', async () => {
    manager.rejected.add('ConfigMap/settings')

    await run()

    expect(core.setFailed).toHaveBeenCalledWith(
      'Action failed with error: ApplyError during stage-two-apply: error applying stage two resources: apply failed for 1 resource(s): core/ConfigMap/team-a/settings: rejected by fake'
    )
    expect(fs.existsSync(inputs.inventory_path)).toBe(false)
  })

  it('rejects an invalid wait_timeout', async () => {
    inputs.wait_timeout = 'soon'

    await run()

    expect(core.setFailed).toHaveBeenCalledWith(
      'Action failed with error: Error: Invalid wait_timeout "soon", expected a positive number of seconds'
    )
    expect(manager.calls).toEqual([])
  })

  it('rejects a max_comment_char_len that is not a positive integer', async () => {
    inputs.github_token = 'test-token'
    inputs.max_comment_char_len = 'lots'

    await run()

    expect(core.setFailed).toHaveBeenCalledWith(
      'Action failed with error: Error: Invalid max_comment_char_len "lots", expected a positive integer'
    )
    expect(manager.calls).toEqual([])
    expect(mockCreateComment).not.toHaveBeenCalled()
  })

  it('rejects an unknown mode', async () => {
    inputs.mode = 'upsert'

    await run()

    expect(core.setFailed).toHaveBeenCalledWith(
      'Action failed with error: Error: Unsupported mode "upsert", expected reconcile or delete'
    )
  })

  it('fails when the manifests cannot be decoded', async () => {
    await fs.promises.writeFile(inputs.manifests_path, 'kind: [unclosed')

    await run()

    expect(core.setFailed).toHaveBeenCalledWith(
      expect.stringMatching(
        /^Action failed with error: DecodeError during decode: Failed to parse YAML document/
      )
    )
  })
})
