/**
 * Outreach Email CLI
 *
 * Drafts a cold email to a professor or lab, written as the student profile.
 * Nothing is sent.
 *
 * Usage:
 *   npx tsx scripts/generate-email.ts "<professor>" "<lab>"
 *   npx tsx scripts/generate-email.ts --research "Tell me about <name> from <university>"
 *
 * With professor/lab arguments the email is also written to final_email.txt.
 *
 * Prerequisites:
 *   - OPENROUTER_API_KEY env var set
 *   - EXA_API_KEY and/or TAVILY_API_KEY for --research
 *   - student.json in the working directory (falls back to data/student_cs.json)
 */

import 'dotenv/config';

import * as fs from 'fs';

import {
  createInitialState,
  errorMessage,
  isOutreachError,
  loadCharacterProfile,
  OUTREACH_CONFIG,
  OutreachError,
  researchQuery,
  runOutreachSession,
  SqliteSessionStore,
} from '../src/ai';
import { resolveStudentProfilePath } from '../src/config/server';

const SESSION_DB_PATH = 'outreach_sessions.db';
const FINAL_EMAIL_PATH = 'final_email.txt';

type CliMode =
  | { readonly kind: 'direct'; readonly recipientInfo: string }
  | { readonly kind: 'research'; readonly query: string };

function parseArgs(argv: readonly string[]): CliMode | null {
  const researchIndex = argv.indexOf('--research');
  if (researchIndex !== -1) {
    const query = argv[researchIndex + 1]?.trim();
    return query ? { kind: 'research', query } : null;
  }
  if (argv.length === 0) return null;

  const professor = argv[0] || 'Unknown Professor';
  const lab = argv[1] || 'Unknown Lab';
  return { kind: 'direct', recipientInfo: `Professor: ${professor}, Lab: ${lab}` };
}

function removeSessionDatabase(): void {
  for (const file of [SESSION_DB_PATH, `${SESSION_DB_PATH}-journal`]) {
    fs.rmSync(file, { force: true });
  }
}

async function resolveRecipientInfo(mode: CliMode): Promise<string> {
  if (mode.kind === 'direct') return mode.recipientInfo;
  try {
    const result = await researchQuery(mode.query);
    console.log(result.text);
    return result.text;
  } catch (error) {
    throw new OutreachError(
      'RESEARCH_FAILED',
      `Recipient research failed: ${errorMessage(error)}`,
      error instanceof Error ? error : undefined
    );
  }
}

async function main(): Promise<void> {
  const mode = parseArgs(process.argv.slice(2));
  if (!mode) {
    console.error('Usage: generate-email.ts "<professor>" "<lab>" | --research "<query>"');
    process.exit(1);
  }

  const profilePath = resolveStudentProfilePath(process.env.STUDENT_PROFILE_PATH);
  const character = loadCharacterProfile(profilePath);
  if (!character) {
    throw new OutreachError('CONTEXT_INVALID', `No usable student profile at ${profilePath}`);
  }

  const recipientInfo = await resolveRecipientInfo(mode);
  const initialState = createInitialState({ recipientInfo, character });

  const store = new SqliteSessionStore(SESSION_DB_PATH);
  let email: string | null;
  try {
    const run = await runOutreachSession(
      store,
      OUTREACH_CONFIG.APP_NAME,
      OUTREACH_CONFIG.DEFAULT_USER_ID,
      initialState,
      undefined,
      { onProgress: (phase, iteration) => console.log(`  [${iteration}/${OUTREACH_CONFIG.MAX_ITERATIONS}] ${phase}`) }
    );
    email = run.email;
    console.log(`\n${run.approved ? 'Approved' : 'Not approved'} after ${run.iterations} iteration(s)`);
  } finally {
    store.close();
    removeSessionDatabase();
  }

  if (email === null) {
    console.log('No email found in session state.');
    return;
  }

  if (mode.kind === 'direct') {
    fs.writeFileSync(FINAL_EMAIL_PATH, email, 'utf-8');
  }
  console.log('\nHere is the generated email:\n');
  console.log(email);
}

main().catch((err) => {
  const code = isOutreachError(err) ? ` [${err.code}]` : '';
  console.error(`\nEmail generation failed${code}: ${errorMessage(err)}`);
  process.exit(1);
});
