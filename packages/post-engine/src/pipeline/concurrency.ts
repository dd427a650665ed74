/**
 * Yield each task's value as soon as it settles, tagged with its index.
 * Tasks are expected to handle their own failures and never reject.
 */
export async function* inCompletionOrder<T>(
  tasks: Promise<T>[]
): AsyncGenerator<{ index: number; value: T }, void, undefined> {
  const pending = new Map<number, Promise<{ index: number; value: T }>>();

  tasks.forEach((task, index) => {
    pending.set(
      index,
      task.then((value) => ({ index, value }))
    );
  });

  while (pending.size > 0) {
    const settled = await Promise.race(pending.values());
    pending.delete(settled.index);
    yield settled;
  }
}
