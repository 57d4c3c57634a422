export * from './log-request'
