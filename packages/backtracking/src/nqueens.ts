/**
 * A placement lists, for each row, the column holding that row's queen.
 */
export type QueenPlacement = number[];

export type SolveOptions = {
  /** Stop after the first solution when false. Default true. */
  findAll?: boolean;
  /** Stop once this many solutions are found. 0 means no limit. */
  maxSolutions?: number;
};

function assertBoardSize(n: number) {
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Board size must be a non-negative integer, got ${n}`);
  }
}

/**
 * Occupied columns and diagonals. A square (r, c) is attacked when its column,
 * its r + c diagonal or its r - c anti-diagonal is taken.
 */
class Occupancy {
  private readonly cols = new Set<number>();
  private readonly diagonals = new Set<number>();
  private readonly antiDiagonals = new Set<number>();

  isFree(row: number, col: number): boolean {
    return !this.cols.has(col) && !this.diagonals.has(row + col) && !this.antiDiagonals.has(row - col);
  }

  place(row: number, col: number): void {
    this.cols.add(col);
    this.diagonals.add(row + col);
    this.antiDiagonals.add(row - col);
  }

  remove(row: number, col: number): void {
    this.cols.delete(col);
    this.diagonals.delete(row + col);
    this.antiDiagonals.delete(row - col);
  }
}

/**
 * Solve n-queens by backtracking, pruning any branch whose next queen would be
 * attacked. Solutions are returned in lexicographic order of their columns.
 */
export function solveNQueens(n: number, options: SolveOptions = {}): QueenPlacement[] {
  assertBoardSize(n);
  const findAll = options.findAll ?? true;
  const maxSolutions = options.maxSolutions ?? 0;
  if (!Number.isInteger(maxSolutions) || maxSolutions < 0) {
    throw new Error(`maxSolutions must be a non-negative integer, got ${maxSolutions}`);
  }

  const solutions: QueenPlacement[] = [];
  const occupancy = new Occupancy();
  const board: QueenPlacement = new Array<number>(n).fill(-1);

  const shouldStop = () =>
    (!findAll && solutions.length > 0) || (maxSolutions > 0 && solutions.length >= maxSolutions);

  const backtrack = (row: number): void => {
    if (row === n) {
      solutions.push([...board]);
      return;
    }

    for (let col = 0; col < n; col++) {
      if (!occupancy.isFree(row, col)) continue;

      board[row] = col;
      occupancy.place(row, col);
      backtrack(row + 1);
      occupancy.remove(row, col);
      board[row] = -1;

      if (shouldStop()) return;
    }
  };

  backtrack(0);
  return solutions;
}

/**
 * Count n-queens solutions with the same search, without storing boards.
 */
export function countNQueens(n: number): number {
  assertBoardSize(n);
  const occupancy = new Occupancy();
  let count = 0;

  const backtrack = (row: number): void => {
    if (row === n) {
      count++;
      return;
    }
    for (let col = 0; col < n; col++) {
      if (!occupancy.isFree(row, col)) continue;
      occupancy.place(row, col);
      backtrack(row + 1);
      occupancy.remove(row, col);
    }
  };

  backtrack(0);
  return count;
}

/**
 * Check that no two queens in a placement attack each other.
 */
export function isValidPlacement(placement: QueenPlacement): boolean {
  const n = placement.length;
  const occupancy = new Occupancy();
  for (let row = 0; row < n; row++) {
    const col = placement[row];
    if (!Number.isInteger(col) || col < 0 || col >= n || !occupancy.isFree(row, col)) {
      return false;
    }
    occupancy.place(row, col);
  }
  return true;
}

/**
 * Render a placement as rows of "." with "Q" at each queen.
 */
export function formatBoard(placement: QueenPlacement): string {
  const n = placement.length;
  return placement
    .map((col, row) => {
      if (!Number.isInteger(col) || col < 0 || col >= n) {
        throw new Error(`Row ${row} has column ${col}, outside the ${n}x${n} board`);
      }
      return ".".repeat(col) + "Q" + ".".repeat(n - col - 1);
    })
    .join("\n");
}
