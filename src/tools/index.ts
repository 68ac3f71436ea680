export { registerUserTools } from "./users.js";
export { registerTransactionTools } from "./transactions.js";
export { registerBudgetTools } from "./budgets.js";
export { registerAnalysisTools } from "./analysis.js";
export { registerResources } from "./resources.js";
export { registerPrompts } from "./prompts.js";
export type { ToolContext } from "./result.js";
