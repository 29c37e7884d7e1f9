import { describe, it, expect, beforeEach } from 'vitest'
import {
  DecrementPredecessorResolver,
  LastKnownPredecessorResolver,
  createPredecessorResolver,
} from './PredecessorResolver'
import { MemorySnapshotStore } from '../storage/MemorySnapshotStore'
import { Snapshot } from './types'

const snapshot = (jobId: number): Snapshot => ({
  jobId,
  timestamp: '2024-01-01T00:00:00.000Z',
  latencyMs: 100,
  objects: new Map([['a', 'h1']]),
})

describe('DecrementPredecessorResolver', () => {
  const resolver = new DecrementPredecessorResolver()

  it('should resolve the previous job id', async () => {
    expect(await resolver.resolvePredecessor(5)).toBe(4)
  })

  it('should resolve no predecessor for the first job', async () => {
    expect(await resolver.resolvePredecessor(1)).toBeNull()
  })
})

describe('LastKnownPredecessorResolver', () => {
  let store: MemorySnapshotStore
  let resolver: LastKnownPredecessorResolver

  beforeEach(async () => {
    store = new MemorySnapshotStore()
    resolver = new LastKnownPredecessorResolver(store)
    for (const jobId of [7, 2, 3]) {
      await store.put(jobId, snapshot(jobId))
    }
  })

  it('should skip over gaps in job ids', async () => {
    expect(await resolver.resolvePredecessor(7)).toBe(3)
  })

  it('should resolve against stored ids even when the job itself is not stored', async () => {
    expect(await resolver.resolvePredecessor(10)).toBe(7)
  })

  it('should resolve no predecessor below the lowest stored job', async () => {
    expect(await resolver.resolvePredecessor(2)).toBeNull()
  })
})

describe('createPredecessorResolver', () => {
  it('should create the configured strategy', () => {
    const store = new MemorySnapshotStore()

    expect(createPredecessorResolver('decrement', store)).toBeInstanceOf(DecrementPredecessorResolver)
    expect(createPredecessorResolver('last-known', store)).toBeInstanceOf(LastKnownPredecessorResolver)
  })
})
