/**
 * 以固定併發數依序處理 items，結果順序與輸入相同。
 * concurrency <= 1 時等同逐一處理。
 */
export async function mapPool<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  let idx = 0;
  const workerCount = Math.max(1, Math.min(concurrency, items.length));

  const worker = async () => {
    while (idx < items.length) {
      const current = idx++;
      results[current] = await fn(items[current], current);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, worker));
  return results;
}
