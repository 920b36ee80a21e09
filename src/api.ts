export { Reconciler } from './reconciler.js'
export type { ObjectDecoder, ReconcilerOptions } from './reconciler.js'
export {
  Inventory,
  identityKey,
  parseApiVersion,
  toApiVersion,
  toReference
} from './inventory.js'
export type { InventoryDocument, InventoryItem } from './inventory.js'
export { decodeManifests, toClusterObject } from './manifest-decoder.js'
export {
  getResourceStages,
  isClusterDefinition,
  isClusterDefinitionIdentity
} from './object-classifier.js'
export {
  KubernetesObjectClient,
  KubernetesResourceManager,
  createKubeConfig,
  createResourceManager
} from './kubernetes-resource-manager.js'
export type { LiveObject, ObjectClient } from './kubernetes-resource-manager.js'
export { computeResourceStatus } from './resource-status.js'
export type { ResourceStatus } from './resource-status.js'
export { readInventory, writeInventory } from './inventory-store.js'
export * from './errors.js'
export * from './types.js'
