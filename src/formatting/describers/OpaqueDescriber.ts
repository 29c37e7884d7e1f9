import { BaseDescriber } from './BaseDescriber'

export class OpaqueDescriber extends BaseDescriber {}
