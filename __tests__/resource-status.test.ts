import { computeResourceStatus } from '../src/resource-status.js'

describe('computeResourceStatus', () => {
  it('reports missing objects', () => {
    expect(computeResourceStatus(undefined)).toBe('NotFound')
  })

  it('reports objects being deleted', () => {
    expect(
      computeResourceStatus({
        kind: 'ConfigMap',
        metadata: { name: 'a', deletionTimestamp: '2024-01-01T00:00:00Z' }
      })
    ).toBe('Terminating')
  })

  it('treats objects without a rollout as current', () => {
    expect(
      computeResourceStatus({ kind: 'ConfigMap', metadata: { name: 'a' } })
    ).toBe('Current')
  })

  it('waits for the controller to observe the latest generation', () => {
    expect(
      computeResourceStatus({
        kind: 'Deployment',
        metadata: { name: 'web', generation: 3 },
        spec: { replicas: 1 },
        status: {
          observedGeneration: 2,
          updatedReplicas: 1,
          availableReplicas: 1,
          replicas: 1
        }
      })
    ).toBe('InProgress')
  })

  it('reports a rolled out deployment as current', () => {
    expect(
      computeResourceStatus({
        kind: 'Deployment',
        metadata: { name: 'web', generation: 2 },
        spec: { replicas: 2 },
        status: {
          observedGeneration: 2,
          updatedReplicas: 2,
          availableReplicas: 2,
          replicas: 2
        }
      })
    ).toBe('Current')
  })

  it('waits while old replicas are still running', () => {
    expect(
      computeResourceStatus({
        kind: 'Deployment',
        metadata: { name: 'web' },
        spec: { replicas: 2 },
        status: { updatedReplicas: 2, availableReplicas: 2, replicas: 3 }
      })
    ).toBe('InProgress')
  })

  it('reports a deployment that stopped progressing as failed', () => {
    expect(
      computeResourceStatus({
        kind: 'Deployment',
        metadata: { name: 'web' },
        spec: { replicas: 1 },
        status: {
          conditions: [{ type: 'Progressing', status: 'False' }]
        }
      })
    ).toBe('Failed')
  })

  it('waits for a namespace to become active', () => {
    expect(
      computeResourceStatus({
        kind: 'Namespace',
        metadata: { name: 'a' },
        status: {}
      })
    ).toBe('InProgress')
    expect(
      computeResourceStatus({
        kind: 'Namespace',
        metadata: { name: 'a' },
        status: { phase: 'Active' }
      })
    ).toBe('Current')
  })

  it('waits for a custom resource definition to be established', () => {
    expect(
      computeResourceStatus({
        kind: 'CustomResourceDefinition',
        metadata: { name: 'widgets.example.com' },
        status: {
          conditions: [
            { type: 'NamesAccepted', status: 'True' },
            { type: 'Established', status: 'True' }
          ]
        }
      })
    ).toBe('Current')
  })

  it('reports failed jobs', () => {
    expect(
      computeResourceStatus({
        kind: 'Job',
        metadata: { name: 'migrate' },
        status: { conditions: [{ type: 'Failed', status: 'True' }] }
      })
    ).toBe('Failed')
  })

  it('honours generic stalled and ready conditions', () => {
    expect(
      computeResourceStatus({
        kind: 'Widget',
        metadata: { name: 'w' },
        status: { conditions: [{ type: 'Stalled', status: 'True' }] }
      })
    ).toBe('Failed')
    expect(
      computeResourceStatus({
        kind: 'Widget',
        metadata: { name: 'w' },
        status: { conditions: [{ type: 'Ready', status: 'False' }] }
      })
    ).toBe('InProgress')
  })

  it('counts daemon set pods', () => {
    expect(
      computeResourceStatus({
        kind: 'DaemonSet',
        metadata: { name: 'agent' },
        status: {
          desiredNumberScheduled: 3,
          updatedNumberScheduled: 3,
          numberAvailable: 2
        }
      })
    ).toBe('InProgress')
  })
})
