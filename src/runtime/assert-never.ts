/**
 * Exhaustiveness helper for discriminated unions.
 * Put it in the `default` branch of a `switch` so adding a union member breaks the build.
 */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
