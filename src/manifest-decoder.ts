import * as yaml from 'js-yaml'
import { DecodeError, errorMessage } from './errors.js'
import { ClusterObject, ObjectMeta } from './types.js'

/**
 * Decodes a multi-document YAML stream into Kubernetes objects.
 * Empty documents are dropped and `List` documents are expanded into their
 * items. Fails as a whole on the first invalid document.
 */
export function decodeManifests(text: string): ClusterObject[] {
  let documents: unknown[]
  try {
    documents = yaml.loadAll(text)
  } catch (error) {
    throw new DecodeError(
      `Failed to parse YAML document: ${errorMessage(error)}`,
      { cause: error }
    )
  }

  const objects: ClusterObject[] = []
  documents.forEach((doc, index) => {
    if (doc === null || doc === undefined) {
      return
    }
    if (isList(doc)) {
      doc.items.forEach((item, itemIndex) => {
        const object = toClusterObject(item)
        if (!object) {
          throw new DecodeError(
            `Item ${itemIndex} of document ${index} is not a Kubernetes object (apiVersion, kind and metadata.name are required)`,
            { documentIndex: index }
          )
        }
        objects.push(object)
      })
      return
    }
    const object = toClusterObject(doc)
    if (!object) {
      throw new DecodeError(
        `Document ${index} is not a Kubernetes object (apiVersion, kind and metadata.name are required)`,
        { documentIndex: index }
      )
    }
    objects.push(object)
  })

  return objects
}

/**
 * Validates an untyped value as a Kubernetes object, returning undefined when
 * an identifying field is missing or mistyped.
 */
export function toClusterObject(value: unknown): ClusterObject | undefined {
  if (!isRecord(value)) {
    return undefined
  }
  const { apiVersion, kind, metadata } = value
  if (
    typeof apiVersion !== 'string' ||
    !apiVersion ||
    typeof kind !== 'string' ||
    !kind ||
    !isRecord(metadata)
  ) {
    return undefined
  }
  const { name, namespace, labels, annotations } = metadata
  if (typeof name !== 'string' || !name) {
    return undefined
  }
  if (namespace != null && typeof namespace !== 'string') {
    return undefined
  }
  if (labels !== undefined && !isStringMap(labels)) {
    return undefined
  }
  if (annotations !== undefined && !isStringMap(annotations)) {
    return undefined
  }

  // carry every declared metadata field, not only the ones typed here
  const meta: ObjectMeta = { name }
  Object.assign(meta, metadata)
  if (typeof namespace === 'string' && namespace) {
    meta.namespace = namespace
  } else {
    delete meta.namespace
  }

  return { ...value, apiVersion, kind, metadata: meta }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// v1 List as written by `kubectl get -o yaml`, or any typed *List
function isList(value: unknown): value is { kind: string; items: unknown[] } {
  return (
    isRecord(value) &&
    typeof value.kind === 'string' &&
    value.kind.endsWith('List') &&
    Array.isArray(value.items)
  )
}

function isStringMap(value: unknown): value is Record<string, string> {
  return (
    isRecord(value) && Object.values(value).every((v) => typeof v === 'string')
  )
}
