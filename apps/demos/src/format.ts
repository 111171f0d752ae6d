type Printable = string | number;

/**
 * `[a, b, c]`
 */
export function formatList(items: readonly Printable[]): string {
  return `[${items.join(", ")}]`;
}

/**
 * `(x, y)`
 */
export function formatPoint([x, y]: readonly [number, number]): string {
  return `(${x}, ${y})`;
}

export function formatPoints(points: readonly (readonly [number, number])[]): string {
  return formatList(points.map(formatPoint));
}

/**
 * One `  node: [neighbours]` line per vertex, vertices sorted.
 */
export function formatAdjacency(graph: ReadonlyMap<string, readonly string[]>): string[] {
  return [...graph.keys()].sort().map((node) => `  ${node}: ${formatList(graph.get(node) ?? [])}`);
}

/**
 * Seconds with four decimals, e.g. `0.0012s`.
 */
export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(4)}s`;
}
