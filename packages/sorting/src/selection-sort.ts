export type Compare<T> = (a: T, b: T) => number;

export type SelectionSortOptions<T> = {
  /** Sort the given array itself instead of a copy. Default false. */
  inPlace?: boolean;
  compare?: Compare<T>;
};

/**
 * Natural ordering: numbers numerically, everything else through < and >.
 */
export function defaultCompare<T>(a: T, b: T): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Index of the smallest element of `items` at or after `from`. The earliest
 * index wins on ties.
 */
export function indexOfMinimum<T>(items: readonly T[], from: number, compare: Compare<T> = defaultCompare): number {
  let minIndex = from;
  for (let j = from + 1; j < items.length; j++) {
    if (compare(items[j], items[minIndex]) < 0) {
      minIndex = j;
    }
  }
  return minIndex;
}

function placeMinimum<T>(items: T[], index: number, compare: Compare<T>): void {
  const minIndex = indexOfMinimum(items, index, compare);
  if (minIndex !== index) {
    [items[index], items[minIndex]] = [items[minIndex], items[index]];
  }
}

/**
 * Selection sort: at each position make the greedy choice of the smallest
 * remaining element and swap it into place. O(n^2) comparisons, at most n - 1
 * swaps.
 */
export function selectionSort<T>(data: T[], options: SelectionSortOptions<T> = {}): T[] {
  const compare = options.compare ?? defaultCompare;
  const items = options.inPlace ? data : [...data];

  for (let i = 0; i < items.length - 1; i++) {
    placeMinimum(items, i, compare);
  }

  return items;
}

/**
 * Perform only the greedy choice for position `index` on a copy of `data`.
 * After steps 0..k the prefix [0, k] holds the k + 1 smallest elements in order.
 */
export function selectionStep<T>(data: readonly T[], index: number, compare: Compare<T> = defaultCompare): T[] {
  if (!Number.isInteger(index) || index < 0 || (data.length > 0 && index >= data.length)) {
    throw new Error(`Step index ${index} is outside an array of length ${data.length}`);
  }
  const items = [...data];
  if (items.length > 0) {
    placeMinimum(items, index, compare);
  }
  return items;
}

/**
 * True when every element is no greater than the next.
 */
export function isSorted<T>(items: readonly T[], compare: Compare<T> = defaultCompare): boolean {
  for (let i = 0; i < items.length - 1; i++) {
    if (compare(items[i], items[i + 1]) > 0) return false;
  }
  return true;
}
