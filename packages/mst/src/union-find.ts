/**
 * Disjoint-set forest with path compression and union by rank.
 *
 * @example
 * ```typescript
 * const sets = new UnionFind(["a", "b", "c"]);
 * sets.union("a", "b"); // true
 * sets.connected("a", "b"); // true
 * sets.union("b", "a"); // false, already merged
 * ```
 */
export class UnionFind<T> {
  private readonly parent = new Map<T, T>();
  private readonly rank = new Map<T, number>();
  private sets = 0;

  constructor(elements: Iterable<T> = []) {
    for (const element of elements) {
      this.add(element);
    }
  }

  /** Number of disjoint sets. */
  get size(): number {
    return this.sets;
  }

  has(element: T): boolean {
    return this.parent.has(element);
  }

  /**
   * Add a singleton set. Returns false if the element was already present.
   */
  add(element: T): boolean {
    if (this.parent.has(element)) return false;
    this.parent.set(element, element);
    this.rank.set(element, 0);
    this.sets++;
    return true;
  }

  /**
   * Representative of the set containing `element`. Every node on the way to
   * the root is re-pointed at the root.
   */
  find(element: T): T {
    const parent = this.parent.get(element);
    if (parent === undefined) {
      throw new Error(`Unknown element '${String(element)}'`);
    }
    if (parent === element) {
      return element;
    }
    const root = this.find(parent);
    this.parent.set(element, root);
    return root;
  }

  /**
   * Merge the sets of `a` and `b`, attaching the shallower tree under the
   * deeper one. Returns false when they were already in the same set.
   */
  union(a: T, b: T): boolean {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return false;

    const rankA = this.rank.get(rootA) ?? 0;
    const rankB = this.rank.get(rootB) ?? 0;
    if (rankA < rankB) {
      this.parent.set(rootA, rootB);
    } else if (rankA > rankB) {
      this.parent.set(rootB, rootA);
    } else {
      this.parent.set(rootB, rootA);
      this.rank.set(rootA, rankA + 1);
    }
    this.sets--;
    return true;
  }

  connected(a: T, b: T): boolean {
    return this.find(a) === this.find(b);
  }
}
