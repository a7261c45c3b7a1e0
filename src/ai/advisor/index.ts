export {
  createAdvisorModel,
  getAdvisorStatus,
  getRagRecommendations,
  parseAdvisorProvider,
  type AdvisorDeps,
  type AdvisorProviderStatus,
  type AdvisorResult,
  type RecommendationSource,
} from './advisor';
export { domainFromUrl, guessDomainFromSchool, inferEmail, slugifyNameForEmail } from './email-inference';
export { fallbackRecommendations } from './fallback';
export { extractJsonRecommendations, heuristicParse, normalizeRecommendations } from './parsing';
export { buildAdvisorPrompt, buildLabsContext } from './prompts';
export { extractCourseworkHints, extractPdfText, isAllowedTranscript } from './transcript';
export {
  studentDataSchema,
  type AdvisorProviderName,
  type AdvisorStudent,
  type LabRecommendation,
  type StudentData,
} from './types';
