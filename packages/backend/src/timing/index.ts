export * from './tempo.js'
export * from './cursor.js'
export * from './convert.js'
export * from './quantization.js'
