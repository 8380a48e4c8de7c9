import { err, ok, type Result } from 'neverthrow';

/**
 * Parses a CLI argument as a safe integer. Rejects empty strings, decimals and
 * anything `Number()` would quietly coerce (whitespace, hex).
 */
export function parseInteger(name: string, raw: string): Result<number, string> {
  if (!/^[+-]?\d+$/.test(raw)) {
    return err(`${name} must be an integer (got '${raw}')`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    return err(`${name} is out of range (got '${raw}')`);
  }
  return ok(value);
}
