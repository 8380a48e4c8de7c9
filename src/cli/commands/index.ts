/**
 * CLI Commands - Public API
 */

export { executeAnalyzeCommand, type AnalyzeCommandDeps } from './analyze.js';
export { executeRangeCommand, type RangeCommandDeps, type RangeCommandArgs } from './range.js';
export { parseInteger } from './parse-integer.js';
