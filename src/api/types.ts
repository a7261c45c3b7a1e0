/**
 * API Type Definitions
 *
 * Dependencies the HTTP layer is built from. Everything that reaches a file,
 * a model or the network sits behind one of these functions so the routes
 * can be exercised in-process.
 */

import type {
  AdvisorProviderName,
  AdvisorProviderStatus,
  AdvisorResult,
  AdvisorStudent,
  CharacterProfile,
  LabRecord,
  OutreachContext,
  OutreachResult,
} from '../ai';
import type { ServerConfig } from '../config/server';
import type { Logger } from '../utils/logger';

export interface ApiDeps {
  readonly config: ServerConfig;
  readonly logger: Logger;
  readonly loadLabs: () => LabRecord[];
  readonly advisorStatus: (provider: AdvisorProviderName) => AdvisorProviderStatus;
  readonly recommend: (
    student: AdvisorStudent,
    labs: readonly LabRecord[],
    provider: AdvisorProviderName
  ) => Promise<AdvisorResult>;
  readonly extractTranscriptText: (data: Uint8Array) => Promise<string>;
  /** Whether the email agents can run (OpenRouter key present) */
  readonly isOutreachConfigured: () => boolean;
  /** Null when the profile file is missing or not a JSON object */
  readonly loadStudentProfile: () => CharacterProfile | null;
  readonly draftEmail: (context: OutreachContext) => Promise<OutreachResult>;
}
