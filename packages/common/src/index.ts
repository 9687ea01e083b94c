export * from './errors'
export * from './logger'
export * from './args'
export * from './config'
export * from './grpc-server'
