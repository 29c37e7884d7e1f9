import { JobRecord } from '../contracts'

export interface SimulationOptions {
  count: number
  baseObjects?: number
  seed?: number
  // Timestamp of job 1; later jobs start one hour apart
  startTime?: Date
}

interface LayoutObject {
  id: string
  type: ObjectType
  x: number
  y: number
  width: number
  height: number
}

const OBJECT_TYPES = ['wall', 'door', 'window', 'column', 'stair'] as const
type ObjectType = (typeof OBJECT_TYPES)[number]

const HOUR_MS = 60 * 60 * 1000

/**
 * Deterministic PRNG (mulberry32) so a seed always yields the same jobs
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function fingerprintOf(object: LayoutObject): string {
  return `${object.type}_${object.x}_${object.y}_${object.width}_${object.height}`
}

class Simulation {
  private random: () => number
  private usedIds = new Set<string>()

  constructor(seed: number) {
    this.random = createRandom(seed)
  }

  int(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1))
  }

  pick<T>(items: readonly T[]): T {
    return items[this.int(0, items.length - 1)]
  }

  sample<T>(items: readonly T[], k: number): T[] {
    const pool = [...items]
    const picked: T[] = []
    while (picked.length < k && pool.length > 0) {
      picked.push(...pool.splice(this.int(0, pool.length - 1), 1))
    }
    return picked
  }

  createObject(id: string, type: ObjectType): LayoutObject {
    this.usedIds.add(id)
    return {
      id,
      type,
      x: this.int(0, 100),
      y: this.int(0, 100),
      width: this.int(1, 10),
      height: this.int(1, 10),
    }
  }

  baseLayout(size: number): LayoutObject[] {
    return Array.from({ length: size }, (_, i) => {
      const type = this.pick(OBJECT_TYPES)
      return this.createObject(`${type[0].toUpperCase()}${String(i).padStart(3, '0')}`, type)
    })
  }

  /**
   * Remove 5-10% of objects, shift 10-20% of the rest, then add 2-5 new ones
   */
  nextLayout(previous: LayoutObject[], jobId: number): LayoutObject[] {
    const current = new Map(previous.map((object) => [object.id, { ...object }]))

    if (current.size > 5) {
      const removeCount = this.int(Math.floor(current.size * 0.05), Math.floor(current.size * 0.1))
      for (const id of this.sample([...current.keys()], removeCount)) {
        current.delete(id)
      }
    }

    const modifyCount = this.int(Math.floor(current.size * 0.1), Math.floor(current.size * 0.2))
    for (const id of this.sample([...current.keys()], modifyCount)) {
      const object = current.get(id)
      if (!object) continue
      object.x += this.int(-2, 2)
      object.y += this.int(-2, 2)
    }

    const addCount = this.int(2, 5)
    for (let i = 0; i < addCount; i++) {
      const type = this.pick(OBJECT_TYPES)
      let id: string
      do {
        id = `J${jobId}N${type[0].toUpperCase()}${this.int(100, 999)}`
      } while (this.usedIds.has(id))
      current.set(id, this.createObject(id, type))
    }

    return [...current.values()]
  }
}

/**
 * Generate sequential job records whose objects drift from one job to the next
 */
export function simulateJobs(options: SimulationOptions): JobRecord[] {
  const { count, baseObjects = 50, seed = 1, startTime = new Date(Date.UTC(2024, 0, 1)) } = options
  const simulation = new Simulation(seed)
  const jobs: JobRecord[] = []

  let layout: LayoutObject[] = []
  for (let jobId = 1; jobId <= count; jobId++) {
    layout = jobId === 1 ? simulation.baseLayout(baseObjects) : simulation.nextLayout(layout, jobId)

    jobs.push({
      job_id: jobId,
      timestamp: new Date(startTime.getTime() + (jobId - 1) * HOUR_MS).toISOString(),
      latency_ms: simulation.int(1000, 30000),
      state: Object.fromEntries(layout.map((object) => [object.id, fingerprintOf(object)])),
    })
  }

  return jobs
}
