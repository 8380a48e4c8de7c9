#!/usr/bin/env node
/**
 * loopwire CLI - Composition Root
 *
 * 1. Parses config from the environment
 * 2. Wires the container
 * 3. Interprets each command's CliResult into output and exit status
 *
 * All command logic lives in src/cli/commands/*.ts
 */

import { Command } from 'commander';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import { loadConfig } from './config/app-config.js';
import { formatAppError } from './errors/formatter.js';
import { createBootstrapLogger } from './core/logging/index.js';
import type { LoopContextFactory } from './application/services/loop-context-factory.js';
import { interpretCliResult, runCommand } from './cli/interpret-result.js';
import { executeAnalyzeCommand, executeRangeCommand } from './cli/commands/index.js';

const logger = createBootstrapLogger('cli');

const configResult = loadConfig({ env: process.env });
if (configResult.isErr()) {
  console.error(formatAppError(configResult.error));
  process.exit(1);
}

initializeContainer({ config: configResult.value });
logger.debug({ loops: configResult.value.loops }, 'container initialized');

const loops = (): LoopContextFactory => container.resolve<LoopContextFactory>(DI.Loops.ContextFactory);

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('loopwire')
  .description('Callback-driven loop runtime with break/continue signaling')
  .version('0.1.0');

program
  .command('analyze')
  .description('Show the unroll hint for a loop of <iterations> iterations')
  .argument('<iterations>', 'iteration count')
  .option('--threshold <n>', 'unroll threshold (defaults to LOOPWIRE_UNROLL_THRESHOLD)')
  .action((iterations: string, options: { threshold?: string }) => {
    const factory = loops();
    interpretCliResult(
      runCommand('analyze', () =>
        executeAnalyzeCommand({ analyze: (n, threshold) => factory.analyze(n, threshold) }, iterations, options.threshold)
      )
    );
  });

program
  .command('range')
  .description('Run a counted-range loop and print the visited values and statistics')
  .argument('<start>', 'first value')
  .argument('<stop>', 'exclusive bound')
  .argument('[step]', 'increment (negative counts down)', '1')
  .option('--break-at <n>', 'signal break when the body sees <n>')
  .option('--continue-at <n>', 'signal continue when the body sees <n>')
  .action((start: string, stop: string, step: string, options: { breakAt?: string; continueAt?: string }) => {
    const factory = loops();
    interpretCliResult(
      runCommand('range', () =>
        executeRangeCommand(
          { createContext: () => factory.create() },
          { start, stop, step, breakAt: options.breakAt, continueAt: options.continueAt }
        )
      )
    );
  });

program.parse();
