/**
 * Outreach Email Types
 *
 * Shared types for the generate → refine → review loop, its session state,
 * and the error type thrown by the pipeline.
 */

import type { TokenUsage } from '../types';

/**
 * Phases of one loop iteration, in execution order.
 */
export const OUTREACH_PHASES = ['writer', 'refiner', 'reviewer'] as const;

export type OutreachPhase = (typeof OUTREACH_PHASES)[number];

// ============================================================================
// Error Types
// ============================================================================

export type OutreachErrorCode =
  | 'CONFIG_ERROR'
  | 'CONTEXT_INVALID'
  | 'WRITER_FAILED'
  | 'REFINER_FAILED'
  | 'REVIEWER_FAILED'
  | 'RESEARCH_FAILED'
  | 'TIMEOUT'
  | 'CANCELLED';

/**
 * Error thrown by the outreach pipeline.
 *
 * @example
 * try {
 *   await generateOutreachEmail(context);
 * } catch (error) {
 *   if (isOutreachError(error) && error.code === 'CONTEXT_INVALID') {
 *     // ask the user for recipient details
 *   }
 * }
 */
export class OutreachError extends Error {
  readonly name = 'OutreachError';

  constructor(
    readonly code: OutreachErrorCode,
    message: string,
    readonly cause?: Error
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, OutreachError);
    }
  }
}

export function isOutreachError(error: unknown): error is OutreachError {
  return error instanceof OutreachError;
}

// ============================================================================
// Context and State
// ============================================================================

/**
 * Student profile the email is written as. Loaded from a JSON file, so its
 * shape is open.
 */
export type CharacterProfile = Readonly<Record<string, unknown>>;

export interface OutreachContext {
  /** Sender's display name (default: OUTREACH_CONFIG.DEFAULT_USER_NAME) */
  readonly userName?: string;
  /** Free-text description of the professor or lab being contacted */
  readonly recipientInfo: string;
  readonly character: CharacterProfile;
}

export type ReviewStatus = 'pass' | 'fail';

/**
 * Session state shared by the agents. Keys are snake_case because the state
 * is persisted as-is by the session stores.
 */
export interface OutreachState {
  readonly user_name: string;
  readonly recipient_info: string;
  readonly character: CharacterProfile;
  readonly email?: string;
  readonly review_feedback: string;
  readonly review_status?: ReviewStatus;
}

// ============================================================================
// Results
// ============================================================================

export interface IterationRecord {
  /** 1-indexed */
  readonly iteration: number;
  readonly email: string;
  readonly wordCount: number;
  readonly approved: boolean;
  readonly feedback: string;
}

export interface OutreachResult {
  /** Last refined email (approved or not) */
  readonly email: string;
  readonly approved: boolean;
  /** Iterations actually run */
  readonly iterations: number;
  readonly history: readonly IterationRecord[];
  readonly finalState: OutreachState;
  readonly tokenUsage: TokenUsage;
  readonly durationMs: number;
  readonly correlationId: string;
}

/**
 * @param phase - Agent about to run
 * @param iteration - 1-indexed loop iteration
 */
export type OutreachProgressCallback = (phase: OutreachPhase, iteration: number, message?: string) => void;
