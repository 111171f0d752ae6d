export type { Compare, SelectionSortOptions } from "./selection-sort.js";

export {
  defaultCompare,
  indexOfMinimum,
  isSorted,
  selectionSort,
  selectionStep,
} from "./selection-sort.js";
