/**
 * Bounded promise pool.
 *
 * Each in-flight promise removes itself from `running` when it settles, so
 * Promise.race() only ever races truly in-flight work and the concurrency
 * limit holds. A rejected task does not stop the pool: the remaining tasks
 * still run to completion and the first rejection is rethrown at the end,
 * so nothing is left running when the pool returns.
 */

export async function runWithConcurrency<T>(
  items: readonly T[],
  maxConcurrency: number,
  task: (item: T, index: number) => Promise<void>,
): Promise<void> {
  const limit = Math.max(1, Math.floor(maxConcurrency))
  const running: Promise<void>[] = []
  let next = 0
  const errors: unknown[] = []

  function enqueue(): void {
    const index = next++
    const item = items[index]
    if (item === undefined) return

    const p: Promise<void> = task(item, index)
      .catch((error: unknown) => {
        errors.push(error)
      })
      .finally(() => {
        const idx = running.indexOf(p)
        if (idx !== -1) running.splice(idx, 1)
      })
    running.push(p)
  }

  // Seed up to the limit, then start one task per settlement
  const initial = Math.min(limit, items.length)
  for (let i = 0; i < initial; i++) enqueue()

  while (next < items.length) {
    await Promise.race(running)
    enqueue()
  }

  await Promise.all(running)
  if (errors.length > 0) throw errors[0]
}
