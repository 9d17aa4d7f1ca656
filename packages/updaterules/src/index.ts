export * from './config'
export * from './errors'
export * from './evaluate'
export * from './explain'
export * from './lint'
export * from './loader'
export * from './matchers'
export * from './presets'
export * from './schedule'
export * from './schema'
export * from './types'
export * from './utils'
export * from './versioning'
