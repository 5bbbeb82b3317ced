import { from, lastValueFrom, map, mergeMap, toArray } from "rxjs";

const DEFAULT_CONCURRENCY = 3;

/**
 * ### Concurrently run an async operation over an array
 * Results come back **in input order**, whatever order the calls finish in.
 * @param items array to process
 * @param cb async handler receiving each item and its index
 * @param concurrency # to process concurrently - defaults to 3
 */
export async function asyncMergeMap<T, U>(
  items: readonly T[],
  cb: (item: T, index: number) => Promise<U>,
  concurrency: number = DEFAULT_CONCURRENCY,
): Promise<U[]> {
  if (items.length === 0) return [];

  const settled = await lastValueFrom(
    from(items.map((item, index) => ({ item, index }))).pipe(
      mergeMap(
        async ({ item, index }) => ({ index, value: await cb(item, index) }),
        concurrency,
      ),
      toArray(),
      map((results) => results.sort((a, b) => a.index - b.index)),
    ),
  );

  return settled.map((r) => r.value);
}
