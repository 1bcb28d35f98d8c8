export {
  SCORING_AGENT_SYSTEM_PROMPT,
  MAX_SCORING_CANDIDATES,
  buildScoringPrompt,
  selectCandidates,
} from './prompts/scoring.prompt.js';
export {
  QA_AGENT_SYSTEM_PROMPT,
  QA_DECLINE_MESSAGE,
  buildQaInstructions,
  qaFailureAnswer,
} from './prompts/qa.prompt.js';
