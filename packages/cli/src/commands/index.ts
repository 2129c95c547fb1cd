/**
 * CLI Commands
 *
 * Export all CLI commands for registration.
 */

export { createAssessCommand, runAssess } from './assess.js'
export type { AssessOptions, AssessDependencies } from './assess.js'

export { createRulesCommand, runRules, describeRules } from './rules.js'
export type { RulesOptions } from './rules.js'
