export * from './binary'
export * from './buffer'
export * from './errors'
export * from './format'
export * from './sample'
export * from './summary'
export * from './types'
