import { ChangeDescriber } from '../ChangeDescriber'
import { Fingerprint, MovePair } from '../../snapshot/types'

/**
 * Wording that treats fingerprints as opaque values.
 * Subclasses override what they can describe in more detail.
 */
export abstract class BaseDescriber implements ChangeDescriber {
  describeAdded(key: string, _fingerprint: Fingerprint): string {
    return `${key} added`
  }

  describeRemoved(key: string, _fingerprint: Fingerprint): string {
    return `${key} removed`
  }

  describeModified(key: string, _before: Fingerprint, _after: Fingerprint): string {
    return `${key} fingerprint changed`
  }

  describeMove(move: MovePair): string {
    return `${move.from} moved to ${move.to}`
  }
}
