/**
 * Agents
 * Research, planning and optimization participants on the bus
 */

export { AGENT_IDS } from './identities.js';
export type { AgentId } from './identities.js';
export { parseJsonObject, stripCodeFence } from './json-response.js';
export {
  buildOptimizationPrompt,
  buildPlanningPrompt,
  buildResearchPrompt,
  tripLengthDays,
} from './prompts.js';
export { ResearchAgent } from './research-agent.js';
export type { ResearchAgentOptions } from './research-agent.js';
export { PlannerAgent, transportOffers, accommodationOffers, activityOffers } from './planner-agent.js';
export type { PlannerAgentOptions, ProposalProducer } from './planner-agent.js';
export { OptimizerAgent, basicOptimization, mergeOptimizedPlan } from './optimizer-agent.js';
export type { OptimizationResult, OptimizationSource, OptimizerAgentOptions } from './optimizer-agent.js';
