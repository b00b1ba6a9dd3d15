/**
 * Assert an internal invariant. Failing one is a bug in this library,
 * never a consequence of caller input.
 */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new Error(`Invariant violation: ${message}`)
  }
}
