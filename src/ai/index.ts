/**
 * AI Module
 *
 * Everything that talks to a language model or a search provider.
 *
 * ## Structure
 *
 * - `/config/` - Model defaults, prompt configs and pipeline tunables
 * - `/tools/` - Exa and Tavily search clients
 * - `/research/` - Web research (search, merge, synthesize)
 * - `/labs/` - Lab discovery, parsing and keyword scoring
 * - `/advisor/` - RAG lab recommendations (Gemini or OpenAI)
 * - `/outreach/` - The generate → refine → review email loop and its session store
 * - `service.ts` - Provider factories and `executeAITask`
 *
 * ## Usage
 *
 * ```typescript
 * import { generateOutreachEmail, isAIConfigured } from './ai';
 *
 * if (isAIConfigured()) {
 *   const result = await generateOutreachEmail({
 *     recipientInfo: 'Professor: Dana Reyes, Lab: Human-Robot Interaction Lab',
 *     character: studentProfile,
 *   });
 * }
 * ```
 */

export {
  isAIConfigured,
  isGeminiConfigured,
  isOpenAIConfigured,
  createOpenRouterModel,
  createGeminiModel,
  createOpenAIModel,
  executeAITask,
} from './service';
export type { AITaskDeps, AITaskResult } from './service';

export {
  getModel,
  AI_DEFAULT_MODELS,
  AI_ENV_KEYS,
  ADVISOR_CONFIG,
  LAB_DISCOVERY_CONFIG,
  OUTREACH_CONFIG,
} from './config';
export type { AITaskConfig, AITaskKey } from './config';

export { researchQuery, buildRecipientResearchQuery } from './research/web-research';
export type { WebResearchDeps, WebResearchResult } from './research/web-research';

export { searchUniversityLabs, populateMajorUniversities, saveLabsToFile } from './labs/lab-discovery';
export { parseLabResults } from './labs/lab-parser';
export { scoreLabs } from './labs/scoring';
export { labRecordSchema, type LabRecord, type ScoredLabRecord } from './labs/types';

export { errorMessage, isRecord } from './tools/parse-utils';

export * from './advisor';
export * from './outreach';
