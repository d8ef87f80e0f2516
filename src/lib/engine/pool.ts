/**
 * Runs task(0..count-1) on at most `concurrency` workers. Tasks are started in index
 * order; each worker picks the next index when its current task settles.
 */
export const runPool = async (
  count: number,
  concurrency: number,
  task: (index: number) => Promise<void>
): Promise<void> => {
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < count) {
      const index = next;
      next += 1;
      await task(index);
    }
  };
  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, count)) }, worker);
  await Promise.all(workers);
};
