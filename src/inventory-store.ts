import * as fs from 'fs'
import * as path from 'path'
import { DecodeError, errorMessage } from './errors.js'
import { Inventory } from './inventory.js'

/**
 * Reads an inventory persisted by a previous run.
 *
 * @returns undefined when the file does not exist yet (first apply)
 */
export async function readInventory(
  filePath: string
): Promise<Inventory | undefined> {
  let content: string
  try {
    content = await fs.promises.readFile(filePath, 'utf8')
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined
    }
    throw error
  }

  let document: unknown
  try {
    document = JSON.parse(content)
  } catch (error) {
    throw new DecodeError(
      `Failed to parse inventory ${filePath}: ${errorMessage(error)}`,
      { phase: 'inventory', cause: error }
    )
  }
  return Inventory.fromJSON(document)
}

export async function writeInventory(
  filePath: string,
  inventory: Inventory
): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true })
  await fs.promises.writeFile(
    filePath,
    `${JSON.stringify(inventory, null, 2)}\n`,
    'utf8'
  )
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}
