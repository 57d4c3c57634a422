export * from './types'
export * from './length-limit'
export * from './units'
export * from './cursor'
export * from './iterable-source'
export * from './read-to-end'
export * from './length-limit-stream'
