export type { QueenPlacement, SolveOptions } from "./nqueens.js";

export {
  solveNQueens,
  countNQueens,
  isValidPlacement,
  formatBoard,
} from "./nqueens.js";
