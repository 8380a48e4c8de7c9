/**
 * Range Command
 *
 * Runs a counted-range loop through the engine and reports what the body saw.
 * `--break-at` / `--continue-at` make the body signal on a given value.
 */

import { err, ok, type Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import type { LoopContext } from '../../domain/loops/loop-context.js';
import { forRange } from '../../domain/loops/drivers.js';
import { formatStatsReport } from '../../domain/loops/stats-report.js';
import { parseInteger } from './parse-integer.js';

export interface RangeCommandDeps {
  readonly createContext: () => LoopContext;
}

export interface RangeCommandArgs {
  readonly start: string;
  readonly stop: string;
  readonly step?: string;
  readonly breakAt?: string;
  readonly continueAt?: string;
}

interface ParsedRangeArgs {
  readonly start: number;
  readonly stop: number;
  readonly step: number;
  readonly breakAt: number | undefined;
  readonly continueAt: number | undefined;
}

export function executeRangeCommand(deps: RangeCommandDeps, args: RangeCommandArgs): CliResult {
  const parsed = parseArgs(args);
  if (parsed.isErr()) {
    return misuse(parsed.error, ['Usage: loopwire range <start> <stop> [step] [--break-at <n>] [--continue-at <n>]']);
  }

  const { start, stop, step, breakAt, continueAt } = parsed.value;
  const ctx = deps.createContext();
  const visited: number[] = [];

  const run = forRange(
    ctx,
    start,
    stop,
    step,
    (i, seen: number[]) => {
      // Break wins when both flags name the same value.
      if (i === breakAt) {
        ctx.signalBreak();
        seen.push(i);
        return;
      }
      if (i === continueAt) {
        ctx.signalContinue();
        return;
      }
      seen.push(i);
    },
    visited
  );

  if (run.isErr()) {
    return failure(run.error.message);
  }

  return success({
    message: `Range ${run.value.exit} after ${run.value.iterations} iteration(s)`,
    details: [`Visited: [${visited.join(', ')}]`, ...formatStatsReport(ctx.stats.snapshot()).split('\n')],
  });
}

function parseArgs(args: RangeCommandArgs): Result<ParsedRangeArgs, string> {
  const start = parseInteger('start', args.start);
  if (start.isErr()) return err(start.error);
  const stop = parseInteger('stop', args.stop);
  if (stop.isErr()) return err(stop.error);
  const step = parseInteger('step', args.step ?? '1');
  if (step.isErr()) return err(step.error);

  const breakAt = parseOptional('--break-at', args.breakAt);
  if (breakAt.isErr()) return err(breakAt.error);
  const continueAt = parseOptional('--continue-at', args.continueAt);
  if (continueAt.isErr()) return err(continueAt.error);

  return ok({
    start: start.value,
    stop: stop.value,
    step: step.value,
    breakAt: breakAt.value,
    continueAt: continueAt.value,
  });
}

function parseOptional(name: string, raw: string | undefined): Result<number | undefined, string> {
  return raw === undefined ? ok(undefined) : parseInteger(name, raw);
}
