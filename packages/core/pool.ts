/**
 * Bounded worker pool
 *
 * Runs at most `concurrency` tasks at once and settles every item, in
 * input order. A rejected task never stops the others.
 */

export async function mapSettled<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length)
  const limit = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length))
  let next = 0

  async function drain(): Promise<void> {
    while (next < items.length) {
      const index = next++
      try {
        results[index] = { status: 'fulfilled', value: await worker(items[index], index) }
      } catch (reason) {
        results[index] = { status: 'rejected', reason }
      }
    }
  }

  await Promise.all(Array.from({ length: limit }, () => drain()))

  return results
}
