export * from './csv'
export * from './files'
export * from './json-array'
export * from './json-lines'
export * from './output'
export * from './parquet'
export * from './postgres'
