export * from './codes'
export * from './io-error'
export * from './renderable'
export * from './service-error'
