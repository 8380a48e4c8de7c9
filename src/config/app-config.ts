/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for config surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import { err, ok, type Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type MaxDepth = Brand<number, 'MaxDepth'>;
export type UnrollThreshold = Brand<number, 'UnrollThreshold'>;

/**
 * What a driver does when its control level cannot be pushed.
 * - `reject`: report the overflow and run nothing
 * - `degrade`: run the loop without its own level (signals hit the enclosing loop)
 */
export type OverflowPolicy = { readonly kind: 'reject' } | { readonly kind: 'degrade' };

export interface AppConfig {
  readonly loops: {
    readonly maxDepth: MaxDepth;
    readonly unrollThreshold: UnrollThreshold;
    readonly overflowPolicy: OverflowPolicy;
  };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

export const DEFAULT_MAX_DEPTH = 1024;
export const DEFAULT_UNROLL_THRESHOLD = 8;

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const optionalInt = (name: string, min: number, max: number, fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int(`${name} must be an integer`)
        .min(min, `${name} must be >= ${min}`)
        .max(max, `${name} must be <= ${max}`)
        .default(fallback)
    );

const EnvSchema = z.object({
  LOOPWIRE_MAX_DEPTH: optionalInt('LOOPWIRE_MAX_DEPTH', 1, 1_000_000, DEFAULT_MAX_DEPTH),
  LOOPWIRE_UNROLL_THRESHOLD: optionalInt('LOOPWIRE_UNROLL_THRESHOLD', 0, 1024, DEFAULT_UNROLL_THRESHOLD),
  LOOPWIRE_OVERFLOW_POLICY: z.enum(['reject', 'degrade']).default('reject'),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data)));
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  const overflowPolicy: OverflowPolicy =
    env.LOOPWIRE_OVERFLOW_POLICY === 'degrade' ? { kind: 'degrade' } : { kind: 'reject' };

  return {
    loops: {
      maxDepth: env.LOOPWIRE_MAX_DEPTH as MaxDepth,
      unrollThreshold: env.LOOPWIRE_UNROLL_THRESHOLD as UnrollThreshold,
      overflowPolicy,
    },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
