export * from './artifacts.js'
export * from './geometry.js'
export * from './logger.js'
export * from './results.js'
export * from './stages.js'
