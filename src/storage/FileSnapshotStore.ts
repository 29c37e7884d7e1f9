import { promises as fs } from 'fs'
import path from 'path'
import { SnapshotStore } from './SnapshotStore'
import { Snapshot } from '../snapshot/types'
import { fromJobRecord, sameSnapshot, toJobRecord } from '../snapshot/serialization'
import {
  JobRecordSchema,
  MalformedSnapshotError,
  NotFoundError,
  SnapshotConflictError,
  StoreUnavailableError,
  errorMessage,
} from '../contracts'
import { debugLog } from '../logging/debugLog'

const hasErrorCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code

const isMissingFileError = (error: unknown): boolean => hasErrorCode(error, 'ENOENT')

/**
 * One JSON document per job at `<dataDir>/job_state/<jobId>.json`
 */
export class FileSnapshotStore implements SnapshotStore {
  private stateDir: string

  private static readonly FILE_PATTERN = /^([1-9][0-9]*)\.json$/

  constructor(dataDir: string) {
    this.stateDir = path.join(dataDir, 'job_state')
  }

  async ensureDir(): Promise<void> {
    await fs.mkdir(this.stateDir, { recursive: true })
  }

  async fetch(jobId: number): Promise<Snapshot> {
    const filePath = this.fileFor(jobId)

    let data: string
    try {
      data = await fs.readFile(filePath, 'utf8')
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new NotFoundError(jobId)
      }
      debugLog({
        event: 'storage_error',
        method: 'fetch',
        file: filePath,
        error: errorMessage(error),
      })
      throw new StoreUnavailableError(jobId, `Failed to read snapshot for job ${jobId}`, { cause: error })
    }

    try {
      return fromJobRecord(JobRecordSchema.parse(JSON.parse(data)))
    } catch (error) {
      throw new StoreUnavailableError(jobId, `Stored snapshot for job ${jobId} is unreadable`, { cause: error })
    }
  }

  async put(jobId: number, snapshot: Snapshot): Promise<void> {
    if (snapshot.jobId !== jobId) {
      throw new MalformedSnapshotError(`snapshot stored under job ${jobId}`, snapshot.jobId)
    }
    const filePath = this.fileFor(jobId)

    try {
      await this.ensureDir()
      await fs.writeFile(filePath, JSON.stringify(toJobRecord(snapshot), null, 2), { encoding: 'utf8', flag: 'wx' })
    } catch (error) {
      // wx: only the job file itself can already exist
      if (hasErrorCode(error, 'EEXIST') && (await this.isFile(filePath))) {
        return this.confirmStored(jobId, snapshot)
      }
      debugLog({
        event: 'storage_error',
        method: 'put',
        file: filePath,
        error: errorMessage(error),
      })
      throw new StoreUnavailableError(jobId, `Failed to save job state for ${jobId}`, { cause: error })
    }

    debugLog({ event: 'snapshot_stored', jobId, file: filePath, objects: snapshot.objects.size })
  }

  // Stored snapshots never change; an identical re-put is a no-op
  private async confirmStored(jobId: number, snapshot: Snapshot): Promise<void> {
    const stored = await this.fetch(jobId)
    if (!sameSnapshot(stored, snapshot)) {
      throw new SnapshotConflictError(jobId)
    }
    debugLog({ event: 'snapshot_already_stored', jobId })
  }

  private async isFile(filePath: string): Promise<boolean> {
    try {
      return (await fs.stat(filePath)).isFile()
    } catch {
      return false
    }
  }

  async list(): Promise<number[]> {
    let entries: string[]
    try {
      entries = await fs.readdir(this.stateDir)
    } catch (error) {
      if (isMissingFileError(error)) {
        return []
      }
      throw new StoreUnavailableError(null, 'Failed to list stored snapshots', { cause: error })
    }

    const jobIds: number[] = []
    for (const entry of entries) {
      const match = FileSnapshotStore.FILE_PATTERN.exec(entry)
      if (match) {
        jobIds.push(Number(match[1]))
      }
    }
    return jobIds.sort((a, b) => a - b)
  }

  /**
   * Job ids become file names, so only positive integers are accepted
   */
  private fileFor(jobId: number): string {
    if (!Number.isSafeInteger(jobId) || jobId <= 0) {
      throw new MalformedSnapshotError(`job id must be a positive integer, got ${jobId}`)
    }
    return path.join(this.stateDir, `${jobId}.json`)
  }
}
