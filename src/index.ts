// General
export * from './errors.ts'
export * from './logging.ts'
export * from './utils.ts'

// Configuration
export * from './command-line.ts'
export * from './config.ts'

// Payloads
export * from './codec.ts'
export * from './model.ts'
export * from './summary.ts'
export * from './synthesizer.ts'

// Producing
export * from './load-generator.ts'
export * from './main.ts'
export * from './publisher.ts'
