export * from './cli'
export * from './coerce'
export * from './compare'
export * from './config'
export * from './errors'
export * from './logger'
export * from './metrics'
export * from './numeric'
export * from './schemas'
export * from './stats'
export type * from './types'
