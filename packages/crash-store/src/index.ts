export * from './record'
export * from './csv'
export * from './crash-table'
export * from './record-store'
export * from './predicate'
export * from './partition'
