export * from './findability.js'
export * from './accessibility.js'
export * from './interoperability.js'
export * from './reusability.js'
export * from './context.js'
