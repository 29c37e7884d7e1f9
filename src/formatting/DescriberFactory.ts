import { ChangeDescriber } from './ChangeDescriber'
import { GeometryDescriber } from './describers/GeometryDescriber'
import { OpaqueDescriber } from './describers/OpaqueDescriber'
import { DescriberKind } from '../contracts'

/**
 * Factory for creating change describers from configuration
 */
export class DescriberFactory {
  static create(kind: DescriberKind): ChangeDescriber {
    switch (kind) {
      case 'geometry':
        return new GeometryDescriber()
      case 'opaque':
        return new OpaqueDescriber()
    }
  }
}
