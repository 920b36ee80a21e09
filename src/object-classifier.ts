import { KUBERNETES } from './constants.js'
import { parseApiVersion } from './inventory.js'
import { ClusterObject, ResourceIdentity, ResourceStages } from './types.js'

/**
 * Whether the object is a namespace or defines a new API type, i.e. something
 * other declared objects may need to exist before they can be admitted.
 */
export function isClusterDefinition(object: ClusterObject): boolean {
  return isClusterDefinitionKind(
    parseApiVersion(object.apiVersion).group,
    object.kind
  )
}

export function isClusterDefinitionIdentity(
  identity: Pick<ResourceIdentity, 'group' | 'kind'>
): boolean {
  return isClusterDefinitionKind(identity.group, identity.kind)
}

function isClusterDefinitionKind(group: string, kind: string): boolean {
  const lowerKind = kind.toLowerCase()
  return KUBERNETES.CLUSTER_DEFINITIONS.some(
    (definition) => definition.group === group && definition.kind === lowerKind
  )
}

/**
 * Splits declared objects into the two batches they are applied in.
 * Relative order is preserved within each stage.
 */
export function getResourceStages(
  objects: readonly ClusterObject[]
): ResourceStages {
  const stages: ResourceStages = { stageOne: [], stageTwo: [] }

  for (const object of objects) {
    if (isClusterDefinition(object)) {
      stages.stageOne.push(object)
    } else {
      stages.stageTwo.push(object)
    }
  }

  return stages
}
