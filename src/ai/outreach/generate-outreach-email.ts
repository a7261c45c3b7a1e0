/**
 * Outreach Email Generator
 *
 * Iterative generate → refine → review loop for cold emails to professors
 * and labs. The writer drafts once, then every iteration refines the draft
 * against the last review and re-reviews it, until the reviewer approves or
 * OUTREACH_CONFIG.MAX_ITERATIONS is reached. Emails are never sent.
 *
 * @example
 * const result = await generateOutreachEmail({
 *   recipientInfo: 'Professor: Dana Reyes, Lab: Human-Robot Interaction Lab',
 *   character: studentProfile,
 * });
 * console.log(result.approved, result.email);
 *
 * @example
 * // With progress reporting and cancellation
 * const controller = new AbortController();
 * const result = await generateOutreachEmail(context, undefined, {
 *   signal: controller.signal,
 *   onProgress: (phase, iteration) => console.log(`[${iteration}] ${phase}`),
 * });
 */

import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { generateObject, generateText, type LanguageModel } from 'ai';

import { createContextualLogger, generateCorrelationId } from '../../utils/logger';
import { getModel } from '../config';
import { OUTREACH_CONFIG } from '../config/pipeline';
import { addTokenUsage, createEmptyTokenUsage, systemClock, type Clock, type TokenUsage } from '../types';
import { runRefiner, runReviewer, runWriter } from './agents';
import {
  OutreachError,
  type IterationRecord,
  type OutreachContext,
  type OutreachErrorCode,
  type OutreachProgressCallback,
  type OutreachResult,
  type OutreachState,
} from './types';

// ============================================================================
// Dependencies and Options
// ============================================================================

export interface OutreachDeps {
  /** Resolves an OpenRouter model ID to a model (default: createOpenRouter) */
  readonly openrouter?: (modelId: string) => LanguageModel;
  readonly generateText?: typeof generateText;
  readonly generateObject?: typeof generateObject;
}

export interface OutreachOptions {
  readonly onProgress?: OutreachProgressCallback;
  /**
   * Timeout for the whole loop in milliseconds. Throws OutreachError
   * 'TIMEOUT' when exceeded. Default: 0 (no timeout).
   */
  readonly timeoutMs?: number;
  /** Aborting throws OutreachError 'CANCELLED' */
  readonly signal?: AbortSignal;
  readonly clock?: Clock;
  /** Generated when omitted */
  readonly correlationId?: string;
  /** Default: OUTREACH_CONFIG.MAX_ITERATIONS */
  readonly maxIterations?: number;
}

interface ResolvedDeps {
  readonly openrouter: (modelId: string) => LanguageModel;
  readonly generateText: typeof generateText;
  readonly generateObject: typeof generateObject;
}

function resolveDeps(deps: OutreachDeps | undefined): ResolvedDeps {
  const openrouter = deps?.openrouter ?? createDefaultOpenRouter();
  return {
    openrouter,
    generateText: deps?.generateText ?? generateText,
    generateObject: deps?.generateObject ?? generateObject,
  };
}

function createDefaultOpenRouter(): (modelId: string) => LanguageModel {
  const apiKey = process.env.OPENROUTER_API_KEY;
  if (!apiKey) {
    throw new OutreachError('CONFIG_ERROR', 'OPENROUTER_API_KEY environment variable is required');
  }
  const provider = createOpenRouter({ apiKey });
  return (modelId: string) => provider(modelId);
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Returns the problems that prevent a loop from starting. Empty when valid.
 */
export function validateOutreachState(state: OutreachState): string[] {
  const issues: string[] = [];
  if (state.recipient_info.trim().length === 0) {
    issues.push('recipient info is required');
  }
  if (Object.keys(state.character).length === 0) {
    issues.push('character profile is empty');
  }
  return issues;
}

export function createInitialState(context: OutreachContext): OutreachState {
  const userName = context.userName?.trim();
  return {
    user_name: userName && userName.length > 0 ? userName : OUTREACH_CONFIG.DEFAULT_USER_NAME,
    recipient_info: context.recipientInfo,
    character: context.character,
    review_feedback: OUTREACH_CONFIG.INITIAL_FEEDBACK,
  };
}

// ============================================================================
// Timeout and Cancellation Helpers
// ============================================================================

interface PhaseOptions {
  readonly signal: AbortSignal | undefined;
  readonly startTime: number;
  readonly timeoutMs: number;
  readonly clock: Clock;
}

function assertCanProceed(options: PhaseOptions): void {
  if (options.signal?.aborted) {
    throw new OutreachError('CANCELLED', 'Outreach email generation was cancelled');
  }
  if (options.timeoutMs > 0 && options.clock.now() - options.startTime > options.timeoutMs) {
    throw new OutreachError('TIMEOUT', `Outreach email generation timed out after ${options.timeoutMs}ms`);
  }
}

async function withTimeoutAndCancellation<T>(
  promise: Promise<T>,
  phaseName: string,
  options: PhaseOptions
): Promise<T> {
  const { signal, timeoutMs, clock, startTime } = options;
  if (!signal && timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  let abortHandler: (() => void) | undefined;

  const cancellation = new Promise<never>((_, reject) => {
    if (signal) {
      abortHandler = () =>
        reject(new OutreachError('CANCELLED', `Outreach email generation was cancelled during ${phaseName}`));
      signal.addEventListener('abort', abortHandler, { once: true });
    }
    if (timeoutMs > 0) {
      const remaining = Math.max(0, timeoutMs - (clock.now() - startTime));
      timeoutId = setTimeout(
        () =>
          reject(
            new OutreachError(
              'TIMEOUT',
              `Outreach email generation timed out during ${phaseName} after ${timeoutMs}ms`
            )
          ),
        remaining
      );
    }
  });

  try {
    return await Promise.race([promise, cancellation]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    if (abortHandler && signal) signal.removeEventListener('abort', abortHandler);
  }
}

/**
 * Runs one agent call, mapping failures onto the phase's error code.
 */
async function runPhase<T>(
  phaseName: string,
  errorCode: OutreachErrorCode,
  fn: () => Promise<T>,
  options: PhaseOptions
): Promise<T> {
  assertCanProceed(options);

  try {
    return await withTimeoutAndCancellation(fn(), phaseName, options);
  } catch (error) {
    if (error instanceof OutreachError && (error.code === 'TIMEOUT' || error.code === 'CANCELLED')) {
      throw error;
    }
    if (options.signal?.aborted) {
      throw new OutreachError('CANCELLED', `Outreach email generation was cancelled during ${phaseName}`);
    }
    throw new OutreachError(
      errorCode,
      `Outreach email generation failed during ${phaseName}: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }
}

// ============================================================================
// Main Loop
// ============================================================================

/**
 * Runs the loop from an existing session state.
 *
 * @throws OutreachError CONTEXT_INVALID, CONFIG_ERROR, WRITER_FAILED,
 *   REFINER_FAILED, REVIEWER_FAILED, TIMEOUT or CANCELLED
 */
export async function runOutreachLoop(
  initialState: OutreachState,
  deps?: OutreachDeps,
  options?: OutreachOptions
): Promise<OutreachResult> {
  const issues = validateOutreachState(initialState);
  if (issues.length > 0) {
    throw new OutreachError('CONTEXT_INVALID', `Invalid outreach context: ${issues.join('; ')}`);
  }

  const maxIterations = options?.maxIterations ?? OUTREACH_CONFIG.MAX_ITERATIONS;
  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new OutreachError('CONFIG_ERROR', `maxIterations must be a positive integer (got ${maxIterations})`);
  }

  const { openrouter, generateText: genText, generateObject: genObject } = resolveDeps(deps);
  const writerModel = openrouter(getModel('EMAIL_WRITER'));
  const refinerModel = openrouter(getModel('EMAIL_REFINER'));
  const reviewerModel = openrouter(getModel('EMAIL_REVIEWER'));

  const correlationId = options?.correlationId ?? generateCorrelationId();
  const log = createContextualLogger('[Outreach]', { correlationId });
  const clock = options?.clock ?? systemClock;
  const signal = options?.signal;
  const onProgress = options?.onProgress;
  const phaseOptions: PhaseOptions = {
    signal,
    startTime: clock.now(),
    timeoutMs: options?.timeoutMs ?? OUTREACH_CONFIG.DEFAULT_TIMEOUT_MS,
    clock,
  };

  log.info(`=== Starting outreach email loop (max ${maxIterations} iterations) ===`);

  let state = initialState;
  let tokenUsage: TokenUsage = createEmptyTokenUsage();
  const history: IterationRecord[] = [];
  let approved = false;
  let iterations = 0;

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    iterations = iteration;
    const iterLog = log.child({ iteration });

    if (iteration === 1) {
      onProgress?.('writer', iteration, 'Drafting email');
      const draft = await runPhase(
        'writer',
        'WRITER_FAILED',
        () => runWriter(state, { generateObject: genObject, model: writerModel, logger: iterLog, signal }),
        phaseOptions
      );
      state = { ...state, email: draft.email };
      tokenUsage = addTokenUsage(tokenUsage, draft.tokenUsage);
    }

    onProgress?.('refiner', iteration, 'Refining email');
    const refined = await runPhase(
      'refiner',
      'REFINER_FAILED',
      () => runRefiner(state, { generateText: genText, model: refinerModel, logger: iterLog, signal }),
      phaseOptions
    );
    state = { ...state, email: refined.email };
    tokenUsage = addTokenUsage(tokenUsage, refined.tokenUsage);

    onProgress?.('reviewer', iteration, 'Reviewing email');
    const review = await runPhase(
      'reviewer',
      'REVIEWER_FAILED',
      () =>
        runReviewer(refined.email, state.recipient_info, {
          generateObject: genObject,
          model: reviewerModel,
          logger: iterLog,
          signal,
        }),
      phaseOptions
    );
    tokenUsage = addTokenUsage(tokenUsage, review.tokenUsage);
    state = { ...state, review_feedback: review.feedback, review_status: review.check.result };

    history.push({
      iteration,
      email: refined.email,
      wordCount: review.check.wordCount,
      approved: review.approved,
      feedback: review.feedback,
    });

    iterLog.structured('info', {
      event: 'iteration_complete',
      approved: review.approved,
      wordCount: review.check.wordCount,
    });

    if (review.approved) {
      approved = true;
      break;
    }
  }

  const durationMs = clock.now() - phaseOptions.startTime;
  log.info(
    `=== Outreach loop finished: ${approved ? 'approved' : 'not approved'} after ${iterations} iteration(s) in ${durationMs}ms ===`
  );

  return {
    email: state.email ?? '',
    approved,
    iterations,
    history,
    finalState: state,
    tokenUsage,
    durationMs,
    correlationId,
  };
}

/**
 * Generates an outreach email for a recipient, written as the given student.
 */
export async function generateOutreachEmail(
  context: OutreachContext,
  deps?: OutreachDeps,
  options?: OutreachOptions
): Promise<OutreachResult> {
  return runOutreachLoop(createInitialState(context), deps, options);
}
