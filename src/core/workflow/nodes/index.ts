export { requirementAnalysis } from './requirement-analysis';
export { coding, buildRevisionBlock } from './coding';
export { review } from './review';
export { documentation, testGeneration, deployment } from './artifacts';
export {
  AgentNode,
  AgentNodeConfig,
  agentLabel,
  callAgent,
  instrumentNode,
} from './shared';
