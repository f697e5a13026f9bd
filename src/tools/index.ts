export { registerExpenseTools } from "./expenses.js";
export { registerKeywordTools } from "./keywords.js";
export { registerBudgetTools } from "./budgets.js";
export { registerAnalysisTools } from "./analysis.js";
export { registerResources } from "./resources.js";
export { registerPrompts } from "./prompts.js";
