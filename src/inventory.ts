import { DecodeError } from './errors.js'
import { isRecord } from './manifest-decoder.js'
import {
  ClusterObject,
  ResourceIdentity,
  ResourceReference
} from './types.js'

/**
 * One managed resource: its identity plus the API version it was applied with.
 * The version is informational and never part of identity comparisons.
 */
export type InventoryItem = Readonly<ResourceReference>

/**
 * Serialised form of an inventory, as persisted by callers between runs
 */
export interface InventoryDocument {
  items: ResourceReference[]
}

/**
 * Splits an apiVersion into group and version; core resources have an empty
 * group.
 */
export function parseApiVersion(apiVersion: string): {
  group: string
  version: string
} {
  const slash = apiVersion.lastIndexOf('/')
  if (slash === -1) {
    return { group: '', version: apiVersion }
  }
  return {
    group: apiVersion.slice(0, slash),
    version: apiVersion.slice(slash + 1)
  }
}

export function toApiVersion(reference: ResourceReference): string {
  return reference.group
    ? `${reference.group}/${reference.version}`
    : reference.version
}

/**
 * Key used for set operations: `namespace_name_group_kind`.
 */
export function identityKey(identity: ResourceIdentity): string {
  return `${identity.namespace}_${identity.name}_${identity.group}_${identity.kind}`
}

export function toReference(object: ClusterObject): ResourceReference {
  const { group, version } = parseApiVersion(object.apiVersion)
  return {
    group,
    kind: object.kind,
    version,
    namespace: object.metadata.namespace ?? '',
    name: object.metadata.name
  }
}

/**
 * The ordered set of resources one reconciliation manages
 */
export class Inventory {
  readonly items: readonly InventoryItem[]

  private constructor(items: readonly InventoryItem[]) {
    this.items = items
  }

  /**
   * Records every object in input order. When two objects share an identity
   * only the first is kept.
   */
  static build(objects: readonly ClusterObject[]): Inventory {
    return Inventory.fromReferences(objects.map(toReference))
  }

  static empty(): Inventory {
    return new Inventory([])
  }

  /**
   * Rebuilds an inventory from its serialised form.
   *
   * @throws {DecodeError} when the document does not describe an inventory
   */
  static fromJSON(value: unknown): Inventory {
    if (!isRecord(value) || !Array.isArray(value.items)) {
      throw new DecodeError('Inventory document must have an items array', {
        phase: 'inventory'
      })
    }

    const references = value.items.map((item: unknown, index) => {
      const reference = toInventoryRecord(item)
      if (!reference) {
        throw new DecodeError(
          `Inventory item ${index} must have string group, kind, version, namespace and a non-empty name`,
          { phase: 'inventory', documentIndex: index }
        )
      }
      return reference
    })

    return Inventory.fromReferences(references)
  }

  private static fromReferences(
    references: readonly ResourceReference[]
  ): Inventory {
    const seen = new Set<string>()
    const items: InventoryItem[] = []

    for (const reference of references) {
      const key = identityKey(reference)
      if (seen.has(key)) {
        continue
      }
      seen.add(key)
      items.push(Object.freeze({ ...reference }))
    }

    return new Inventory(Object.freeze(items))
  }

  get size(): number {
    return this.items.length
  }

  identityKeys(): string[] {
    return this.items.map(identityKey)
  }

  /**
   * References of every item held here but absent (by identity) from
   * `other`, in this inventory's order. Items only present in `other` are
   * never part of the result.
   */
  itemsToRemove(other: Inventory): ResourceReference[] {
    const retained = new Set(other.identityKeys())

    return this.items
      .filter((item) => !retained.has(identityKey(item)))
      .map((item) => ({ ...item }))
  }

  toJSON(): InventoryDocument {
    return { items: this.items.map((item) => ({ ...item })) }
  }
}

function toInventoryRecord(value: unknown): ResourceReference | undefined {
  if (!isRecord(value)) {
    return undefined
  }
  const { group, kind, version, namespace, name } = value
  if (
    typeof group !== 'string' ||
    typeof kind !== 'string' ||
    typeof version !== 'string' ||
    typeof namespace !== 'string' ||
    typeof name !== 'string' ||
    !kind ||
    !name
  ) {
    return undefined
  }
  return { group, kind, version, namespace, name }
}
