import type { Logger } from '../../core/logging/types.js';
import type { LoopStatsSnapshot } from './execution-stats.js';

export function formatStatsReport(snapshot: LoopStatsSnapshot): string {
  return [
    '=== Loop Statistics ===',
    `Total iterations: ${snapshot.totalIterations}`,
    `Break statements: ${snapshot.breaksHit}`,
    `Continue statements: ${snapshot.continuesHit}`,
  ].join('\n');
}

export function logStats(logger: Logger, snapshot: LoopStatsSnapshot): void {
  logger.info({ ...snapshot }, 'loop statistics');
}
