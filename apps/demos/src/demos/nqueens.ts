import assert from "assert/strict";
import { getKnownQueensCount } from "@textbook/config";
import { countNQueens, formatBoard, solveNQueens } from "@textbook/backtracking";
import type { DemoContext } from "../context";
import { formatSeconds } from "../format";

export function runNQueensDemo({ print, logger, config }: DemoContext): void {
  print("N-Queens: branch-and-bound + backtracking demo");

  for (const n of config.NQUEENS_SIZES) {
    print();
    print(`Solving n=${n}`);

    const solveStart = performance.now();
    const solutions = solveNQueens(n);
    const solveMs = performance.now() - solveStart;
    print(`  Found ${solutions.length} solutions in ${formatSeconds(solveMs)}`);
    if (solutions.length > 0) {
      print("  Example solution (board):");
      print(formatBoard(solutions[0]));
    }

    // Cross-check with the counting search
    const countStart = performance.now();
    const count = countNQueens(n);
    const countMs = performance.now() - countStart;
    print(`  Count function: ${count} solutions in ${formatSeconds(countMs)}`);
    assert.equal(count, solutions.length, "Count mismatch between solver and counter");

    const known = getKnownQueensCount(n);
    if (known !== null) {
      assert.equal(count, known, `N=${n} should have ${known} solutions`);
    }
    logger.debug({ n, solutions: count, solveMs, countMs }, "nqueens size solved");
  }

  assert.equal(countNQueens(4), 2, "N=4 should have 2 solutions");
  assert.equal(countNQueens(8), 92, "N=8 should have 92 solutions");

  print();
  print("Demo assertions passed.");
}
