import { loadConfig } from '../config.js';
import { TicketmasterCatalog } from '../mastra/tools/search-ticketmaster.js';
import { OpenMeteoForecast } from '../mastra/tools/fetch-forecast.js';
import { ExaWebSearch } from '../mastra/tools/search-web.js';
import { MastraJudge } from '../mastra/agents/judge.js';
import { RecommendationService } from '../mastra/workflows/recommendation-pipeline.js';
import { createApp } from './app.js';
import { errorMessage } from '../errors.js';

function readConfig(): ReturnType<typeof loadConfig> {
  try {
    return loadConfig();
  } catch (error) {
    console.error(`[server] ❌ ${errorMessage(error)}`);
    process.exit(1);
  }
}

const env = readConfig();
const http = { timeoutMs: env.HTTP_TIMEOUT_MS };

const service = new RecommendationService({
  catalog: new TicketmasterCatalog({ apiKey: env.TICKETMASTER_API_KEY, http }),
  forecast: new OpenMeteoForecast({ http }),
  judge: new MastraJudge({
    apiKey: env.ANTHROPIC_API_KEY,
    model: env.JUDGE_MODEL,
    timeoutMs: env.JUDGE_TIMEOUT_MS,
  }),
  search: env.EXA_API_KEY ? new ExaWebSearch(env.EXA_API_KEY) : undefined,
});

const app = createApp(service);

// ---------------------
// Start server
// ---------------------
app.listen(env.PORT, () => {
  console.log(`🚀 Server running on http://localhost:${env.PORT}`);
  console.log(`   Environment: ${env.NODE_ENV}`);
  console.log(`   Judge model: ${env.JUDGE_MODEL}`);
  console.log(`   Web enrichment: ${env.EXA_API_KEY ? 'on' : 'off'}`);
});

export { app };
