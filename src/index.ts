export * from './types/index.js';
export type * from './types/collaborators.js';
export * from './errors.js';
export { loadConfig, type AppConfig } from './config.js';

export {
  RecommendationService,
  createRecommendationWorkflow,
  parseTopN,
  parseUserRequest,
  type RecommendationServiceDeps,
} from './mastra/workflows/recommendation-pipeline.js';
export { QaOrchestrator, answerQuestion, type QaPhase, type QaTurn } from './mastra/workflows/steps/qa.step.js';
export { rankEvents } from './mastra/workflows/steps/ranking.step.js';
export { mergeCollected } from './mastra/workflows/steps/collect.step.js';
export { scoreStage } from './mastra/workflows/steps/scoring.step.js';
export { createCollectEventsTool, fetchAllEvents } from './mastra/tools/collect-events.js';
export { createCollectForecastTool, collectForecasts } from './mastra/tools/collect-forecast.js';
export { sanitizeScores } from './mastra/workflows/utils/sanitize-scores.js';
export { buildGroundingBlock } from './mastra/workflows/utils/context-block.js';
export { EMPTY_CONVERSATION, appendTurn } from './mastra/workflows/utils/conversation.js';
export * from './mastra/agents/prompts.js';

export { MastraJudge } from './mastra/agents/judge.js';
export { TicketmasterCatalog } from './mastra/tools/search-ticketmaster.js';
export { OpenMeteoForecast } from './mastra/tools/fetch-forecast.js';
export { ExaWebSearch } from './mastra/tools/search-web.js';
export { isWeekend, isOutdoor, normalizeEvent } from './mastra/tools/utils/ticketmaster-mapper.js';
export { isSuitableOutdoor, normalizeForecastDay } from './mastra/tools/utils/forecast-mapper.js';

export { createApp } from './api/app.js';
