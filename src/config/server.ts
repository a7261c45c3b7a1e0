/**
 * Server Configuration
 *
 * Reads the web app's settings from the environment. Validated with zod so a
 * bad PORT or limit fails at startup instead of on the first request.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import type { AdvisorProviderName } from '../ai/advisor/types';

export const CLIENT_MAX_MB = 16;
export const SERVER_MAX_MB = 32;

const DEFAULT_STUDENT_PROFILE_PATH = 'student.json';
const FALLBACK_STUDENT_PROFILE_PATH = path.join('data', 'student_cs.json');

const serverEnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LABS_DATA_PATH: z.string().min(1).default(path.join('data', 'labs.json')),
  PUBLIC_DIR: z.string().min(1).default('public'),
  STUDENT_PROFILE_PATH: z.string().min(1).optional(),
  AI_PROVIDER: z
    .string()
    .default('gemini')
    .transform((value): AdvisorProviderName => (value.trim().toLowerCase() === 'openai' ? 'openai' : 'gemini')),
  CLIENT_MAX_MB: z.coerce.number().positive().default(CLIENT_MAX_MB),
  SERVER_MAX_MB: z.coerce.number().positive().default(SERVER_MAX_MB),
});

export interface ServerConfig {
  readonly port: number;
  readonly labsDataPath: string;
  readonly publicDir: string;
  /** Profile the email-draft route writes as */
  readonly studentProfilePath: string;
  readonly aiProvider: AdvisorProviderName;
  /** Advertised to clients and used in the 413 message */
  readonly clientMaxMb: number;
  /** Enforced request body limit */
  readonly serverMaxMb: number;
}

export class ServerConfigError extends Error {
  constructor(message: string) {
    super(`Server config error: ${message}`);
    this.name = 'ServerConfigError';
  }
}

/**
 * `student.json` when present, otherwise the bundled sample profile.
 */
export function resolveStudentProfilePath(configured: string | undefined): string {
  if (configured) return configured;
  return fs.existsSync(DEFAULT_STUDENT_PROFILE_PATH) ? DEFAULT_STUDENT_PROFILE_PATH : FALLBACK_STUDENT_PROFILE_PATH;
}

/**
 * @throws ServerConfigError when a variable is present but invalid
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  // Empty strings count as unset
  const defined = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = serverEnvSchema.safeParse(defined);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ServerConfigError(details);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    labsDataPath: values.LABS_DATA_PATH,
    publicDir: values.PUBLIC_DIR,
    studentProfilePath: resolveStudentProfilePath(values.STUDENT_PROFILE_PATH),
    aiProvider: values.AI_PROVIDER,
    clientMaxMb: values.CLIENT_MAX_MB,
    serverMaxMb: values.SERVER_MAX_MB,
  };
}
