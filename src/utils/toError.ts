/**
 * Coerces an unknown thrown value into an {@link Error}.
 *
 * `catch` clauses and rejected promises can carry anything; the storage and
 * lock layers run every caught value through here before wrapping it in a
 * domain error, so `cause` is always an `Error`.
 *
 * @param e - The caught value.
 * @returns `e` itself when it is already an `Error`, otherwise `new Error(String(e))`.
 */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e))
}

/**
 * Reads the `code` of a Node.js system error (`ENOENT`, `EEXIST`, …).
 *
 * @returns The code, or `undefined` when `e` carries none.
 */
export function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && 'code' in e && typeof e.code === 'string') {
    return e.code
  }
  return undefined
}
