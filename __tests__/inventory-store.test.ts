import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { DecodeError } from '../src/errors.js'
import { Inventory } from '../src/inventory.js'
import { readInventory, writeInventory } from '../src/inventory-store.js'
import { decodeManifests } from '../src/manifest-decoder.js'

describe('inventory store', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'inventory-'))
  })

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true })
  })

  it('reads nothing before the first run', async () => {
    expect(await readInventory(path.join(dir, 'missing.json'))).toBeUndefined()
  })

  it('reads back what it wrote, creating parent directories', async () => {
    const file = path.join(dir, 'state', 'inventory.json')
    const inventory = Inventory.build(
      decodeManifests(`apiVersion: apps/v1
kind: Deployment
metadata:
  name: web
  namespace: shop`)
    )

    await writeInventory(file, inventory)
    const restored = await readInventory(file)

    expect(restored?.items).toEqual([
      {
        group: 'apps',
        kind: 'Deployment',
        version: 'v1',
        namespace: 'shop',
        name: 'web'
      }
    ])
    expect(await fs.promises.readFile(file, 'utf8')).toBe(`{
  "items": [
    {
      "group": "apps",
      "kind": "Deployment",
      "version": "v1",
      "namespace": "shop",
      "name": "web"
    }
  ]
}
`)
  })

  it('rejects a file that is not JSON', async () => {
    const file = path.join(dir, 'inventory.json')
    await fs.promises.writeFile(file, 'items: []', 'utf8')

    const error = await readInventory(file).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(DecodeError)
    expect(error).toMatchObject({ phase: 'inventory' })
  })
})
