/**
 * Pipeline Configuration
 *
 * Centralized constants for the outreach email loop, lab discovery, the RAG
 * advisor and retry behaviour. All tunables live here - no magic numbers in
 * the agents. Values are validated once at module load.
 */

// ============================================================================
// Validation Helpers
// ============================================================================

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(`Pipeline config error: ${message}`);
    this.name = 'ConfigValidationError';
  }
}

function validateMinMax(minValue: number, maxValue: number, minName: string, maxName: string): void {
  if (minValue > maxValue) {
    throw new ConfigValidationError(
      `${minName} (${minValue}) cannot be greater than ${maxName} (${maxValue})`
    );
  }
}

function validatePositive(value: number, name: string): void {
  if (value <= 0) {
    throw new ConfigValidationError(`${name} must be positive (got ${value})`);
  }
}

function validateNonNegative(value: number, name: string): void {
  if (value < 0) {
    throw new ConfigValidationError(`${name} cannot be negative (got ${value})`);
  }
}

function validateTemperature(value: number, name: string): void {
  if (value < 0 || value > 2) {
    throw new ConfigValidationError(`${name} must be between 0 and 2 (got ${value})`);
  }
}

// ============================================================================
// Outreach Email Configuration
// ============================================================================

export const OUTREACH_CONFIG = {
  /** Hard cap on generate → refine → review rounds */
  MAX_ITERATIONS: 5,
  /** Inclusive word range an email must land in */
  MIN_WORDS: 150,
  MAX_WORDS: 300,
  /** review_feedback seeded into a fresh session */
  INITIAL_FEEDBACK: 'Initial email generation - no feedback yet',
  /** Reviewer feedback when the email is approved */
  APPROVED_FEEDBACK: 'Email meets all requirements. Exiting the refinement loop.',
  WRITER_TEMPERATURE: 0.7,
  REFINER_TEMPERATURE: 0.4,
  REVIEWER_TEMPERATURE: 0.1,
  WRITER_MAX_OUTPUT_TOKENS: 1200,
  REFINER_MAX_OUTPUT_TOKENS: 1200,
  REVIEWER_MAX_OUTPUT_TOKENS: 600,
  /** Default timeout for the whole loop (ms) - 0 means no timeout */
  DEFAULT_TIMEOUT_MS: 0,
  /** Session bookkeeping used by the CLI */
  APP_NAME: 'research-outreach',
  DEFAULT_USER_ID: 'student',
  DEFAULT_USER_NAME: 'Alex',
} as const;

// ============================================================================
// Web Research Configuration
// ============================================================================

export const RESEARCH_CONFIG = {
  /** Results requested from each search provider */
  EXA_RESULTS: 8,
  TAVILY_RESULTS: 8,
  /** Longest snippet passed to the model per source */
  MAX_SNIPPET_LENGTH: 1200,
  /** Cap on sources after de-duplication */
  MAX_SOURCES: 12,
  /** Sources allowed per lab-discovery search query */
  LAB_QUERY_RESULTS: 10,
} as const;

// ============================================================================
// Lab Discovery Configuration
// ============================================================================

export const LAB_DISCOVERY_CONFIG = {
  DEFAULT_LIMIT: 20,
  MAJOR_UNIVERSITY_LIMIT: 15,
  /** Pause between universities when populating the catalog */
  DELAY_BETWEEN_UNIVERSITIES_MS: 2000,
  DEFAULT_DESCRIPTION: 'Research laboratory',
  MAJOR_UNIVERSITIES: [
    'University of Texas at Dallas',
    'Massachusetts Institute of Technology',
    'Stanford University',
    'University of California Berkeley',
    'Carnegie Mellon University',
    'California Institute of Technology',
    'Harvard University',
    'Princeton University',
    'University of Washington',
    'Georgia Institute of Technology',
  ],
} as const;

// ============================================================================
// Advisor Configuration
// ============================================================================

export const ADVISOR_CONFIG = {
  /** Labs summarized into the prompt */
  MAX_LABS_IN_PROMPT: 50,
  /** Transcript characters passed to the model */
  MAX_TRANSCRIPT_CHARS: 4000,
  TEMPERATURE: 0.35,
  TOP_K: 1,
  TOP_P: 1,
  MAX_OUTPUT_TOKENS: 1200,
  /** Items kept by the markdown heuristic parser */
  MAX_HEURISTIC_ITEMS: 3,
  /** Items returned by the scoring fallback */
  MAX_FALLBACK_ITEMS: 3,
  FALLBACK_DESCRIPTION_LENGTH: 400,
  /** Coursework tokens pulled from a transcript */
  COURSEWORK_HINT_LIMIT: 20,
  COURSEWORK_TOKEN_MAX_LENGTH: 80,
  /** Top results returned by the non-AI /api/recommendations route */
  BASIC_RECOMMENDATION_LIMIT: 10,
  DEFAULT_LAB_NAME: 'Recommended Lab',
  DEFAULT_EMAIL_DOMAIN: 'college.edu',
} as const;

// ============================================================================
// Retry Configuration
// ============================================================================

export const RETRY_CONFIG = {
  /** Maximum number of retry attempts */
  MAX_RETRIES: 3,
  /** Initial delay in milliseconds before first retry */
  INITIAL_DELAY_MS: 1000,
  /** Maximum delay in milliseconds between retries */
  MAX_DELAY_MS: 10000,
  /** Multiplier for exponential backoff */
  BACKOFF_MULTIPLIER: 2,
} as const;

// ============================================================================
// Validation
// ============================================================================

function validateConfiguration(): void {
  validatePositive(OUTREACH_CONFIG.MAX_ITERATIONS, 'OUTREACH_CONFIG.MAX_ITERATIONS');
  validatePositive(OUTREACH_CONFIG.MIN_WORDS, 'OUTREACH_CONFIG.MIN_WORDS');
  validateMinMax(
    OUTREACH_CONFIG.MIN_WORDS,
    OUTREACH_CONFIG.MAX_WORDS,
    'OUTREACH_CONFIG.MIN_WORDS',
    'OUTREACH_CONFIG.MAX_WORDS'
  );
  validateTemperature(OUTREACH_CONFIG.WRITER_TEMPERATURE, 'OUTREACH_CONFIG.WRITER_TEMPERATURE');
  validateTemperature(OUTREACH_CONFIG.REFINER_TEMPERATURE, 'OUTREACH_CONFIG.REFINER_TEMPERATURE');
  validateTemperature(OUTREACH_CONFIG.REVIEWER_TEMPERATURE, 'OUTREACH_CONFIG.REVIEWER_TEMPERATURE');
  validateNonNegative(OUTREACH_CONFIG.DEFAULT_TIMEOUT_MS, 'OUTREACH_CONFIG.DEFAULT_TIMEOUT_MS');

  validatePositive(RESEARCH_CONFIG.MAX_SOURCES, 'RESEARCH_CONFIG.MAX_SOURCES');
  validatePositive(RESEARCH_CONFIG.MAX_SNIPPET_LENGTH, 'RESEARCH_CONFIG.MAX_SNIPPET_LENGTH');

  validatePositive(LAB_DISCOVERY_CONFIG.DEFAULT_LIMIT, 'LAB_DISCOVERY_CONFIG.DEFAULT_LIMIT');
  validatePositive(LAB_DISCOVERY_CONFIG.MAJOR_UNIVERSITY_LIMIT, 'LAB_DISCOVERY_CONFIG.MAJOR_UNIVERSITY_LIMIT');
  validateNonNegative(
    LAB_DISCOVERY_CONFIG.DELAY_BETWEEN_UNIVERSITIES_MS,
    'LAB_DISCOVERY_CONFIG.DELAY_BETWEEN_UNIVERSITIES_MS'
  );

  validatePositive(ADVISOR_CONFIG.MAX_LABS_IN_PROMPT, 'ADVISOR_CONFIG.MAX_LABS_IN_PROMPT');
  validatePositive(ADVISOR_CONFIG.MAX_TRANSCRIPT_CHARS, 'ADVISOR_CONFIG.MAX_TRANSCRIPT_CHARS');
  validateTemperature(ADVISOR_CONFIG.TEMPERATURE, 'ADVISOR_CONFIG.TEMPERATURE');
  validatePositive(ADVISOR_CONFIG.MAX_OUTPUT_TOKENS, 'ADVISOR_CONFIG.MAX_OUTPUT_TOKENS');
  validatePositive(ADVISOR_CONFIG.MAX_FALLBACK_ITEMS, 'ADVISOR_CONFIG.MAX_FALLBACK_ITEMS');

  validatePositive(RETRY_CONFIG.MAX_RETRIES, 'RETRY_CONFIG.MAX_RETRIES');
  validatePositive(RETRY_CONFIG.INITIAL_DELAY_MS, 'RETRY_CONFIG.INITIAL_DELAY_MS');
  validateMinMax(
    RETRY_CONFIG.INITIAL_DELAY_MS,
    RETRY_CONFIG.MAX_DELAY_MS,
    'RETRY_CONFIG.INITIAL_DELAY_MS',
    'RETRY_CONFIG.MAX_DELAY_MS'
  );
  validatePositive(RETRY_CONFIG.BACKOFF_MULTIPLIER, 'RETRY_CONFIG.BACKOFF_MULTIPLIER');
}

// Run validation at module load time
validateConfiguration();
