/**
 * Brand helper for "parse, don't validate".
 *
 * A branded number or string proves it went through a parser at a boundary
 * (config loading, CLI argument parsing). Brands are erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
