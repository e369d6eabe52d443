export {
  DEFAULT_BUDGET,
  InvalidBudgetError,
  isValidBudgetCount,
  resolveBudget,
  validateBudgetTables,
  formatBudget,
  fitsWithin,
  type ResourceBudget,
  type ResourceKind,
  type BudgetTable,
} from "./budget.js";
