import { describe, it, expect } from 'vitest'
import { GeometryDescriber, describeShift, parsePlacement } from './GeometryDescriber'
import { DescriberFactory } from '../DescriberFactory'
import { OpaqueDescriber } from './OpaqueDescriber'

describe('parsePlacement', () => {
  it('should read type and position from a layout fingerprint', () => {
    expect(parsePlacement('wall_12_-3_5_1')).toEqual({ type: 'wall', x: 12, y: -3 })
  })

  it('should reject fingerprints that are not layout fingerprints', () => {
    expect(parsePlacement('9f86d081884c7d65')).toBeNull()
    expect(parsePlacement('wall_twelve_3_5_1')).toBeNull()
    expect(parsePlacement('_1_2')).toBeNull()
  })
})

describe('describeShift', () => {
  it('should combine horizontal and vertical movement', () => {
    expect(describeShift(-4, 1)).toBe('4 units west and 1 units north')
  })

  it('should describe a single axis', () => {
    expect(describeShift(0, -2)).toBe('2 units south')
  })
})

describe('GeometryDescriber', () => {
  const describer = new GeometryDescriber()

  it('should describe where an object was added', () => {
    expect(describer.describeAdded('D010', 'door_5_6_1_2')).toBe('D010 (door added at x:5, y:6)')
  })

  it('should describe a repositioned object', () => {
    expect(describer.describeModified('W001', 'wall_1_1_4_1', 'wall_3_1_4_1')).toBe(
      'W001 (wall) repositioned 2 units east'
    )
  })

  it('should fall back to opaque wording for other fingerprints', () => {
    expect(describer.describeAdded('src/a.ts', 'abc123')).toBe('src/a.ts added')
    expect(describer.describeModified('src/a.ts', 'abc123', 'def456')).toBe('src/a.ts fingerprint changed')
  })
})

describe('DescriberFactory', () => {
  it('should create the configured describer', () => {
    expect(DescriberFactory.create('geometry')).toBeInstanceOf(GeometryDescriber)
    expect(DescriberFactory.create('opaque')).toBeInstanceOf(OpaqueDescriber)
  })
})
