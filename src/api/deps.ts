/**
 * Production wiring for the HTTP API.
 */

import { generateText } from 'ai';

import {
  createAdvisorModel,
  extractPdfText,
  generateOutreachEmail,
  getAdvisorStatus,
  getRagRecommendations,
  isAIConfigured,
  loadCharacterProfile,
} from '../ai';
import type { ServerConfig } from '../config/server';
import { createPrefixedLogger } from '../utils/logger';
import { loadLabsData } from './labs/services/lab-catalog';
import type { ApiDeps } from './types';

export function createDefaultApiDeps(config: ServerConfig): ApiDeps {
  const logger = createPrefixedLogger('[API]');

  return {
    config,
    logger,
    loadLabs: () => loadLabsData(config.labsDataPath),
    advisorStatus: getAdvisorStatus,
    recommend: (student, labs, provider) =>
      getRagRecommendations(student, labs, {
        generateText,
        model: createAdvisorModel(provider),
        logger: createPrefixedLogger('[Advisor]'),
      }),
    extractTranscriptText: extractPdfText,
    isOutreachConfigured: isAIConfigured,
    loadStudentProfile: () => loadCharacterProfile(config.studentProfilePath, logger),
    draftEmail: (context) => generateOutreachEmail(context),
  };
}
