export * from './guardrail/index.js'
export * from './audit/index.js'
export * from './config/index.js'
