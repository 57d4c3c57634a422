export * as routes from './routes'
export * as schemas from './schemas'
export * as plugins from './plugins'
export * from './error-handler'
