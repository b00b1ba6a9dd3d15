/**
 * Debug logging
 * Enabled with MOMENTS_DEBUG=1, written to stderr
 */

export function debugEnabled(): boolean {
  return process.env.MOMENTS_DEBUG === '1'
}

export function debug(scope: string, ...args: unknown[]): void {
  if (!debugEnabled()) return
  console.error(`[${scope}]`, ...args)
}
