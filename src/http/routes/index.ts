export { default as upload } from './upload'
export { default as healthcheck } from './health'
