import { BaseDescriber } from './BaseDescriber'
import { Fingerprint } from '../../snapshot/types'

export interface Placement {
  type: string
  x: number
  y: number
}

/**
 * Parse a `<type>_<x>_<y>_<width>_<height>` fingerprint.
 * Returns null for anything else; only type, x and y are read.
 */
export function parsePlacement(fingerprint: Fingerprint): Placement | null {
  const [type, rawX, rawY] = fingerprint.split('_')
  if (!type || rawX === undefined || rawY === undefined) return null

  if (!/^-?\d+$/.test(rawX) || !/^-?\d+$/.test(rawY)) return null

  return { type, x: Number(rawX), y: Number(rawY) }
}

export function describeShift(dx: number, dy: number): string {
  const direction: string[] = []
  if (dx > 0) direction.push(`${dx} units east`)
  else if (dx < 0) direction.push(`${-dx} units west`)

  if (dy > 0) direction.push(`${dy} units north`)
  else if (dy < 0) direction.push(`${-dy} units south`)

  return direction.join(' and ')
}

/**
 * Describes fingerprints of placed layout objects (walls, doors, ...) by
 * position. Falls back to opaque wording when a fingerprint does not parse.
 */
export class GeometryDescriber extends BaseDescriber {
  describeAdded(key: string, fingerprint: Fingerprint): string {
    const placement = parsePlacement(fingerprint)
    if (!placement) return super.describeAdded(key, fingerprint)

    return `${key} (${placement.type} added at x:${placement.x}, y:${placement.y})`
  }

  describeModified(key: string, before: Fingerprint, after: Fingerprint): string {
    const previous = parsePlacement(before)
    const current = parsePlacement(after)
    if (!previous || !current) return super.describeModified(key, before, after)

    const dx = current.x - previous.x
    const dy = current.y - previous.y
    if (dx === 0 && dy === 0) {
      return `${key} attributes modified (not position).`
    }

    return `${key} (${previous.type}) repositioned ${describeShift(dx, dy)}`
  }
}
