/**
 * Outreach Email Module
 *
 * @example
 * import { generateOutreachEmail, isOutreachError } from './ai/outreach';
 */

export {
  createInitialState,
  generateOutreachEmail,
  runOutreachLoop,
  validateOutreachState,
  type OutreachDeps,
  type OutreachOptions,
} from './generate-outreach-email';

export {
  InMemorySessionStore,
  SqliteSessionStore,
  runOutreachSession,
  type OutreachSession,
  type OutreachSessionRun,
  type OutreachSessionStore,
} from './session-store';

export { checkEmail, containsEmoji, countWords, findPlaceholders, type EmailCheckResult } from './email-checks';

export {
  OUTREACH_PHASES,
  OutreachError,
  isOutreachError,
  type CharacterProfile,
  type IterationRecord,
  type OutreachContext,
  type OutreachErrorCode,
  type OutreachPhase,
  type OutreachProgressCallback,
  type OutreachResult,
  type OutreachState,
  type ReviewStatus,
} from './types';
export { loadCharacterProfile } from './profile';
