import { Fingerprint, MovePair } from '../snapshot/types'

/**
 * Turns individual changes into human-readable report lines
 */
export interface ChangeDescriber {
  describeAdded(key: string, fingerprint: Fingerprint): string

  describeRemoved(key: string, fingerprint: Fingerprint): string

  /**
   * @param before Fingerprint in the previous job
   * @param after Fingerprint in the current job
   */
  describeModified(key: string, before: Fingerprint, after: Fingerprint): string

  describeMove(move: MovePair): string
}
