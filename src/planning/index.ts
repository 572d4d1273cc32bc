export {
  buildPlan,
  matchRule,
  selectChain,
  decompose,
  findPlan,
  DEFAULT_AGENT,
  DEFAULT_SCENE,
  DEFAULT_SPLIT_TEMPLATE,
  DEFAULT_WORKFLOW_MODE,
  type PlanBuilderOptions,
} from './plan-builder.js';
export { inferCategory } from './category.js';
export { parseRules, parseChains } from './catalog.js';
export { PlanningService, MAX_HISTORY_PAGE } from './planning-service.js';
