export { ControlStack, type ControlState } from './control-stack.js';
export { RangeIterator } from './range-iterator.js';
export { ExecutionStats, type LoopStatsSnapshot } from './execution-stats.js';
export { LoopContext, createLoopContext, type LoopContextOptions } from './loop-context.js';
export {
  type ControlStackOverflowError,
  type InvalidLoopArgumentError,
  type InvalidRangeError,
  type LoopError,
} from './loop-errors.js';
export type { LoopExit, LoopOutcome, LoopRun, LoopShape } from './loop-supervisor.js';
export {
  forRange,
  whileLoop,
  doWhileLoop,
  forEach,
  forEachNumber,
  forEachString,
  nestedLoop2d,
  repeat,
  infiniteLoop,
  type Maybe,
  type LoopBody,
  type GridBody,
  type ActionBody,
  type LoopCondition,
} from './drivers.js';
export { analyzeLoop, type LoopHint } from './loop-hint.js';
export { formatStatsReport, logStats } from './stats-report.js';
