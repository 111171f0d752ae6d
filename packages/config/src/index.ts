export type UndirectedEdgeTuple = [string, string];

export type WeightedEdgeTuple = [string, string, number];

export type GridCell = [number, number]; // [x, y]

export type GridScenario = {
  width: number;
  height: number;
  walls: GridCell[];
  start: GridCell;
  goal: GridCell;
};

// =============================================================================
// Traversal samples
// =============================================================================

/**
 * Small undirected graph with a cycle (B-E-F-C) used by the depth-first demo.
 * G is added separately as an isolated vertex.
 */
export const DFS_SAMPLE_EDGES: UndirectedEdgeTuple[] = [
  ["A", "B"], ["A", "C"],
  ["B", "D"], ["B", "E"],
  ["C", "F"], ["E", "F"]
];

export const DFS_ISOLATED_NODE = "G";

export const BFS_SAMPLE_EDGES: UndirectedEdgeTuple[] = [
  ["1", "2"], ["1", "3"],
  ["2", "4"], ["2", "5"],
  ["3", "6"], ["5", "6"],
  ["6", "7"]
];

export const BFS_ISOLATED_NODE = "H";

// =============================================================================
// Grid pathfinding
// =============================================================================

// Right, left, down, up
export const GRID_DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1]
];

export const GRID_SCENARIO: GridScenario = {
  width: 8,
  height: 6,
  walls: [
    [2, 0], [2, 1], [2, 2], [2, 3],
    [4, 2], [5, 2], [6, 2]
  ],
  start: [0, 0],
  goal: [7, 5]
};

// =============================================================================
// N-Queens
// =============================================================================

/** Number of distinct solutions for small boards (OEIS A000170). */
export const KNOWN_QUEENS_COUNTS: Record<number, number> = {
  1: 1,
  2: 0,
  3: 0,
  4: 2,
  5: 10,
  6: 4,
  7: 40,
  8: 92
};

export const DEFAULT_QUEENS_SIZES = [4, 8];

// =============================================================================
// Sorting
// =============================================================================

export const SELECTION_SORT_SAMPLE = [64, 25, 12, 22, 11];

export const GREEDY_STEP_SAMPLE = [3, 1, 4, 2];

// =============================================================================
// Minimum spanning trees
// =============================================================================

/** Classic 9-vertex, 14-edge weighted graph. Its minimum spanning tree weighs 37. */
export const MST_SAMPLE_EDGES: WeightedEdgeTuple[] = [
  ["A", "B", 4], ["A", "H", 8], ["B", "H", 11],
  ["B", "C", 8], ["H", "I", 7], ["H", "G", 1],
  ["I", "C", 2], ["C", "F", 4], ["C", "D", 7],
  ["G", "F", 2], ["D", "F", 14], ["D", "E", 9],
  ["F", "E", 10], ["G", "I", 6]
];

/** Same graph as MST_SAMPLE_EDGES listed per source vertex, as the traced Kruskal run prints it. */
export const KRUSKAL_TRACE_EDGES: WeightedEdgeTuple[] = [
  ["A", "B", 4], ["A", "H", 8],
  ["B", "C", 8], ["B", "H", 11],
  ["C", "D", 7], ["C", "F", 4],
  ["C", "I", 2], ["D", "E", 9],
  ["D", "F", 14], ["E", "F", 10],
  ["F", "G", 2], ["G", "H", 1],
  ["G", "I", 6], ["H", "I", 7]
];

/** 6-vertex graph used by the Prim demo. Its minimum spanning tree weighs 12. */
export const PRIM_SAMPLE_EDGES: WeightedEdgeTuple[] = [
  ["1", "2", 4], ["1", "3", 2],
  ["2", "3", 1], ["2", "4", 3],
  ["3", "4", 5], ["3", "5", 6],
  ["4", "5", 2], ["4", "6", 7],
  ["5", "6", 4]
];

export const PRIM_SAMPLE_START = "1";

// =============================================================================
// Restaurant chatbot
// =============================================================================

export const RESTAURANT_PHONE = "(555) 123-4567";

export type ChatKeyword = {
  keyword: string;
  response: string;
};

const WELCOME = "Hi! Welcome to our restaurant. How can I help you?";

/**
 * Keyword table for the chatbot. Order matters: the first keyword found in the
 * input wins, so "hello" is checked before "hi".
 */
export const RESTAURANT_RESPONSES: ChatKeyword[] = [
  { keyword: "hello", response: WELCOME },
  { keyword: "hi", response: WELCOME },
  { keyword: "bye", response: "Goodbye! Have a nice day!" },
  { keyword: "menu", response: "We offer: \n- Pizza ($12)\n- Burger ($10)\n- Pasta ($15)\n- Salad ($8)" },
  { keyword: "hours", response: "We are open from 10 AM to 10 PM, Monday to Sunday." },
  { keyword: "location", response: "We are located at 123 Main Street, Downtown." },
  { keyword: "phone", response: `You can reach us at ${RESTAURANT_PHONE}.` },
  { keyword: "delivery", response: "Yes, we offer delivery! Minimum order $20." },
  { keyword: "payment", response: "We accept cash, credit cards, and digital payments." },
  { keyword: "reservation", response: `To make a reservation, please call us at ${RESTAURANT_PHONE}.` },
  { keyword: "wifi", response: "Yes, we have free WiFi for customers!" },
  { keyword: "parking", response: "Yes, free parking is available behind the restaurant." }
];

export const QUESTION_FALLBACK = `Please call us at ${RESTAURANT_PHONE} for specific questions.`;

export const DEFAULT_FALLBACK =
  "I'm not sure about that. Can I help you with our menu, hours, location, or reservations?";

export const CHAT_QUIT_COMMAND = "quit";

/**
 * Get the expected solution count for an n-queens board, or null when the
 * table does not cover n.
 */
export function getKnownQueensCount(n: number): number | null {
  return KNOWN_QUEENS_COUNTS[n] ?? null;
}
