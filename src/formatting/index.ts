export type { ChangeDescriber } from './ChangeDescriber'
export { DescriberFactory } from './DescriberFactory'
export { BaseDescriber } from './describers/BaseDescriber'
export { GeometryDescriber, parsePlacement, describeShift } from './describers/GeometryDescriber'
export { OpaqueDescriber } from './describers/OpaqueDescriber'
export { renderReport } from './ReportRenderer'
