/**
 * AI Configuration Types
 *
 * Each prompt-driven AI task (web research, lab discovery) exports an
 * AITaskConfig describing its model, system prompt and prompt builder.
 */

/**
 * Base configuration for any AI task
 */
export interface AITaskConfig<TContext = unknown> {
  /** Human-readable name for this AI task */
  name: string;

  /** Description of what this task does */
  description: string;

  /**
   * OpenRouter model identifier (e.g., 'openai/gpt-4.1'). Task configs expose
   * this as a getter over getModel() so AI_MODEL_* is read at call time.
   */
  readonly model: string;

  /** Optional system prompt for the AI */
  systemPrompt?: string;

  /** Generates the user prompt from the task context */
  buildPrompt: (context: TContext) => string;

  /** Optional temperature setting (0-2, default varies by model) */
  temperature?: number;

  /** Optional max output tokens */
  maxTokens?: number;
}

/**
 * A single web source as shown to the model.
 */
export interface SourceDigestEntry {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
}

/**
 * Context for recipient/topic research synthesis
 */
export interface WebResearchContext {
  query: string;
  sources: readonly SourceDigestEntry[];
}

/**
 * Context for university lab discovery
 */
export interface LabDiscoveryContext {
  university: string;
  limit: number;
  sources: readonly SourceDigestEntry[];
}
