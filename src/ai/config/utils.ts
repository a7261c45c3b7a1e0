/**
 * AI Configuration Utilities
 *
 * Centralized configuration for AI models and environment variables.
 * Change default models here - no need to modify individual call sites.
 */

/**
 * Environment variable names for each AI task.
 * Set these env vars to override the default models.
 */
export const AI_ENV_KEYS = {
  WEB_RESEARCH: 'AI_MODEL_WEB_RESEARCH',
  LAB_DISCOVERY: 'AI_MODEL_LAB_DISCOVERY',
  EMAIL_WRITER: 'AI_MODEL_EMAIL_WRITER',
  EMAIL_REFINER: 'AI_MODEL_EMAIL_REFINER',
  EMAIL_REVIEWER: 'AI_MODEL_EMAIL_REVIEWER',
  ADVISOR_GEMINI: 'AI_MODEL_ADVISOR_GEMINI',
  ADVISOR_OPENAI: 'AI_MODEL_ADVISOR_OPENAI',
} as const;

/**
 * Default models for each AI task.
 *
 * Research, lab discovery and the email agents go through OpenRouter, so their
 * IDs carry a vendor prefix. The advisor talks to Google or OpenAI directly.
 */
export const AI_DEFAULT_MODELS = {
  WEB_RESEARCH: 'openai/gpt-4.1',
  LAB_DISCOVERY: 'openai/gpt-4o',
  EMAIL_WRITER: 'google/gemini-2.0-flash-001',
  EMAIL_REFINER: 'google/gemini-2.0-flash-001',
  EMAIL_REVIEWER: 'google/gemini-2.0-flash-001',
  ADVISOR_GEMINI: 'gemini-1.5-pro',
  ADVISOR_OPENAI: 'gpt-4o-mini',
} as const;

export type AITaskKey = keyof typeof AI_ENV_KEYS;
export type AIEnvKey = (typeof AI_ENV_KEYS)[AITaskKey];

/**
 * Get the model for a specific AI task.
 * Checks the environment variable first, falls back to the default model.
 *
 * @example
 * const model = getModel('EMAIL_WRITER');
 * // AI_MODEL_EMAIL_WRITER if set, otherwise 'google/gemini-2.0-flash-001'
 */
export function getModel(taskKey: AITaskKey): string {
  const envKey = AI_ENV_KEYS[taskKey];
  const defaultModel = AI_DEFAULT_MODELS[taskKey];
  return process.env[envKey] || defaultModel;
}
