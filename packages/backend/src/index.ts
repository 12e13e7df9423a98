// Library entry point
export * from './parsers/index.js'
export * from './timing/index.js'
export * from './runtime/index.js'
export { loadConfig, type AppConfig } from './config.js'
export { buildServer, startServer } from './server.js'
