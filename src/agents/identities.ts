/**
 * Well-known bus identities
 */
export const AGENT_IDS = {
  orchestrator: 'orchestrator',
  planner: 'planner',
  optimizer: 'optimizer',
  research: 'research',
} as const;

export type AgentId = (typeof AGENT_IDS)[keyof typeof AGENT_IDS];
