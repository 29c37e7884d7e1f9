import { describe, it, expect } from 'vitest'
import { diffSnapshots, detectMoves, assertWellFormed, emptyBaseline } from './DiffEngine'
import { Snapshot } from './types'
import { fromJobRecord } from './serialization'
import { simulateJobs } from '../simulator/JobSimulator'
import { MalformedSnapshotError } from '../contracts'

const snapshot = (jobId: number, objects: Record<string, string>): Snapshot => ({
  jobId,
  timestamp: `2024-01-01T0${jobId}:00:00.000Z`,
  latencyMs: 1000 * jobId,
  objects: new Map(Object.entries(objects)),
})

const union = (...lists: string[][]): string[] => [...new Set(lists.flat())].sort()

describe('diffSnapshots', () => {
  describe('classification', () => {
    it('should mark a changed fingerprint under the same key as modified', () => {
      const changes = diffSnapshots(snapshot(1, { a: 'h1' }), snapshot(2, { a: 'h2' }))

      expect(changes.added).toEqual([])
      expect(changes.removed).toEqual([])
      expect(changes.modified).toEqual(['a'])
      expect(changes.unchanged).toEqual([])
      expect(changes.moved).toEqual([])
      expect(changes.details.get('a')).toEqual({ before: 'h1', after: 'h2' })
    })

    it('should classify added, removed and unchanged keys', () => {
      const changes = diffSnapshots(
        snapshot(1, { keep: 'k', gone: 'g1' }),
        snapshot(2, { keep: 'k', fresh: 'f1' })
      )

      expect(changes.added).toEqual(['fresh'])
      expect(changes.removed).toEqual(['gone'])
      expect(changes.unchanged).toEqual(['keep'])
      expect(changes.details.get('fresh')).toEqual({ before: null, after: 'f1' })
      expect(changes.details.get('gone')).toEqual({ before: 'g1', after: null })
      expect(changes.details.has('keep')).toBe(false)
    })

    it('should compare fingerprints exactly', () => {
      const changes = diffSnapshots(
        snapshot(1, { a: 'wall_1_2_3_4', b: 'Door' }),
        snapshot(2, { a: 'wall_1_2_3_4 ', b: 'door' })
      )

      expect(changes.modified).toEqual(['a', 'b'])
    })

    it('should return sorted key lists', () => {
      const changes = diffSnapshots(snapshot(1, {}), snapshot(2, { c: '1', a: '2', B: '3', b: '4' }))

      expect(changes.added).toEqual(['B', 'a', 'b', 'c'])
    })

    it('should report every key as unchanged when diffing a snapshot with itself', () => {
      const same = snapshot(3, { a: 'h1', b: 'h2', c: 'h1' })
      const changes = diffSnapshots(same, same)

      expect(changes.added).toEqual([])
      expect(changes.removed).toEqual([])
      expect(changes.modified).toEqual([])
      expect(changes.moved).toEqual([])
      expect(changes.unchanged).toEqual(['a', 'b', 'c'])
    })

    it('should treat every object as added against an empty baseline', () => {
      const current = snapshot(1, { a: 'h1', b: 'h2' })
      const changes = diffSnapshots(emptyBaseline(current), current)

      expect(changes.added).toEqual(['a', 'b'])
      expect(changes.removed).toEqual([])
      expect(changes.moved).toEqual([])
    })
  })

  describe('move detection', () => {
    it('should pair a removed key with an added key sharing its fingerprint', () => {
      const changes = diffSnapshots(
        snapshot(1, { a: 'h1', b: 'h2' }),
        snapshot(2, { a: 'h1', c: 'h2' })
      )

      expect(changes.removed).toEqual(['b'])
      expect(changes.added).toEqual(['c'])
      expect(changes.modified).toEqual([])
      expect(changes.unchanged).toEqual(['a'])
      expect(changes.moved).toEqual([{ from: 'b', to: 'c', fingerprint: 'h2' }])
    })

    it('should pair colliding fingerprints in ascending key order', () => {
      const previous = snapshot(1, { r2: 'h', r1: 'h', keep: 'x' })
      const current = snapshot(2, { a2: 'h', a1: 'h', keep: 'x' })

      const first = diffSnapshots(previous, current)
      const second = diffSnapshots(previous, current)

      expect(first.moved).toEqual([
        { from: 'r1', to: 'a1', fingerprint: 'h' },
        { from: 'r2', to: 'a2', fingerprint: 'h' },
      ])
      expect(second.moved).toEqual(first.moved)
    })

    it('should leave surplus keys unpaired and never reuse a key', () => {
      const changes = diffSnapshots(
        snapshot(1, { r1: 'h' }),
        snapshot(2, { a2: 'h', a1: 'h' })
      )

      expect(changes.moved).toEqual([{ from: 'r1', to: 'a1', fingerprint: 'h' }])
      expect(changes.added).toEqual(['a1', 'a2'])
      expect(changes.removed).toEqual(['r1'])
    })

    it('should list moves by source key across fingerprints', () => {
      const changes = diffSnapshots(
        snapshot(1, { z: 'h1', b: 'h2' }),
        snapshot(2, { y: 'h1', c: 'h2' })
      )

      expect(changes.moved).toEqual([
        { from: 'b', to: 'c', fingerprint: 'h2' },
        { from: 'z', to: 'y', fingerprint: 'h1' },
      ])
    })

    it('should not pair keys whose fingerprint only matches a modified key', () => {
      const changes = diffSnapshots(
        snapshot(1, { a: 'h1', b: 'h2' }),
        snapshot(2, { a: 'h2', c: 'h1' })
      )

      expect(changes.modified).toEqual(['a'])
      expect(changes.removed).toEqual(['b'])
      expect(changes.added).toEqual(['c'])
      expect(changes.moved).toEqual([])
    })
  })

  describe('properties', () => {
    const jobs = simulateJobs({ count: 6, baseObjects: 30, seed: 7 }).map(fromJobRecord)
    const pairs = jobs.slice(1).map((current, i) => [jobs[i], current] as const)

    it('should partition the keys of both snapshots', () => {
      for (const [previous, current] of pairs) {
        const changes = diffSnapshots(previous, current)
        const all = [...changes.added, ...changes.removed, ...changes.modified, ...changes.unchanged]

        expect(all.length).toBe(new Set(all).size)
        expect(union(changes.added, changes.modified, changes.unchanged)).toEqual([...current.objects.keys()].sort())
        expect(union(changes.removed, changes.modified, changes.unchanged)).toEqual([...previous.objects.keys()].sort())
      }
    })

    it('should produce identical change sets for identical inputs', () => {
      for (const [previous, current] of pairs) {
        expect(diffSnapshots(previous, current)).toEqual(diffSnapshots(previous, current))
      }
    })

    it('should mirror added and removed when the inputs are swapped', () => {
      for (const [previous, current] of pairs) {
        const forward = diffSnapshots(previous, current)
        const backward = diffSnapshots(current, previous)

        expect(backward.removed).toEqual(forward.added)
        expect(backward.added).toEqual(forward.removed)
        expect(backward.modified).toEqual(forward.modified)
        expect(backward.unchanged).toEqual(forward.unchanged)
      }
    })

    it('should only pair keys from the added and removed lists', () => {
      for (const [previous, current] of pairs) {
        const changes = diffSnapshots(previous, current)
        for (const move of changes.moved) {
          expect(changes.removed).toContain(move.from)
          expect(changes.added).toContain(move.to)
        }
        expect(new Set(changes.moved.map((move) => move.from)).size).toBe(changes.moved.length)
        expect(new Set(changes.moved.map((move) => move.to)).size).toBe(changes.moved.length)
      }
    })
  })

  describe('malformed input', () => {
    it('should reject a non-positive job id', () => {
      expect(() => diffSnapshots(snapshot(0, {}), snapshot(1, {}))).toThrow(MalformedSnapshotError)
    })

    it('should reject a missing timestamp', () => {
      const broken = { ...snapshot(2, { a: 'h1' }), timestamp: '' }
      expect(() => assertWellFormed(broken)).toThrow('Job 2: timestamp is missing')
    })

    it('should reject a negative latency', () => {
      const broken = { ...snapshot(2, {}), latencyMs: -5 }
      expect(() => diffSnapshots(snapshot(1, {}), broken)).toThrow(
        'Job 2: latency must be a non-negative integer, got -5'
      )
    })
  })
})

describe('detectMoves', () => {
  it('should return no moves when nothing was added', () => {
    const previous = snapshot(1, { a: 'h1' })
    const current = snapshot(2, {})

    expect(detectMoves([], ['a'], previous, current)).toEqual([])
  })
})
