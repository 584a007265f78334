/**
 * Brand helper for "parse, don't validate".
 *
 * A branded value (a SigningKey, a ValidatedConfig) proves it passed a
 * parser at a boundary. Brands are erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
