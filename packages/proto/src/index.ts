export * from './types'
export * from './typed-value'
export * from './timing'
export * from './wire'
export * from './paging'
export * from './service'
export * from './client'
export * from './server'
export * from './inbox'
