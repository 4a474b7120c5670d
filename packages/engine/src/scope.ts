import { GraphRestoreError } from './errors'

/** Undo one applied change to host state. */
export type Release = () => void | Promise<void>

/** Apply a change to host state and return how to undo it. */
export type Acquire = () => Promise<Release>

/**
 * Run `body` with every scope acquired in order, then release them in
 * reverse on every exit path. If an acquire fails, the scopes already held
 * are released and the acquire error propagates. A failed release raises
 * GraphRestoreError, which takes precedence over the body's own outcome.
 */
export async function withScopes<T>(
  targetKey: string,
  acquirers: readonly Acquire[],
  body: () => Promise<T>,
): Promise<T> {
  const held: Release[] = []
  let outcome: { ok: true; value: T } | { ok: false; error: unknown }

  try {
    for (const acquire of acquirers) {
      held.push(await acquire())
    }
    outcome = { ok: true, value: await body() }
  } catch (error) {
    outcome = { ok: false, error }
  }

  const failures: unknown[] = []
  for (const release of [...held].reverse()) {
    try {
      await release()
    } catch (error) {
      failures.push(error)
    }
  }

  if (failures.length > 0) throw new GraphRestoreError(targetKey, failures)
  if (!outcome.ok) throw outcome.error
  return outcome.value
}
