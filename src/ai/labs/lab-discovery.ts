/**
 * Lab Discovery
 *
 * Builds the labs catalog: web search for each university's labs and faculty,
 * a model pass that lists labs with their principal investigators, and the
 * lab parser to turn that listing into records.
 */

import * as fs from 'fs';
import * as path from 'path';
import { generateText, type LanguageModel } from 'ai';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { labDiscoveryConfig } from '../config';
import { LAB_DISCOVERY_CONFIG, RESEARCH_CONFIG } from '../config/pipeline';
import { createDefaultSearchProviders, gatherSources, mergeSources, type WebSearchFn } from '../research/sources';
import { sleep as defaultSleep } from '../retry';
import { executeAITask } from '../service';
import { errorMessage } from '../tools/parse-utils';
import { parseLabResults } from './lab-parser';
import type { LabRecord } from './types';

export interface LabDiscoveryDeps {
  readonly generateText: typeof generateText;
  /** Overrides the OpenRouter model from AI_MODEL_LAB_DISCOVERY */
  readonly model?: LanguageModel;
  readonly search: readonly WebSearchFn[];
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
  readonly sleep?: (ms: number) => Promise<void>;
}

export interface PopulateOptions {
  readonly universities?: readonly string[];
  readonly limit?: number;
  readonly delayMs?: number;
  /** Called after each university with the labs found for it */
  readonly onUniversity?: (university: string, labs: readonly LabRecord[]) => void;
}

/**
 * Search queries run for each university before the model pass.
 */
export function buildLabSearchQueries(university: string): string[] {
  return [`${university} research labs faculty`, `${university} principal investigators research groups`];
}

/**
 * Finds research labs at one university.
 *
 * Never throws: search or model failures are logged and yield [].
 */
export async function searchUniversityLabs(
  university: string,
  limit: number = LAB_DISCOVERY_CONFIG.DEFAULT_LIMIT,
  deps: Partial<LabDiscoveryDeps> = {}
): Promise<LabRecord[]> {
  const log = deps.logger ?? createPrefixedLogger('[LabDiscovery]');
  const search = deps.search ?? createDefaultSearchProviders();

  try {
    const perQuery = await Promise.all(
      buildLabSearchQueries(university).map((query) =>
        gatherSources(query, search, { limitPerProvider: RESEARCH_CONFIG.LAB_QUERY_RESULTS })
      )
    );
    const sources = mergeSources(perQuery);
    log.info(`${university}: ${sources.length} source(s) collected`);

    const { text } = await executeAITask(
      labDiscoveryConfig,
      { university, limit, sources },
      {
        generateText: deps.generateText ?? generateText,
        model: deps.model,
        signal: deps.signal,
        logger: log,
      }
    );
    log.debug(`${university}: model output ${text.length} characters`);

    return parseLabResults(text, university, log);
  } catch (error) {
    log.error(`Error searching labs for ${university}: ${errorMessage(error)}`);
    return [];
  }
}

/**
 * Discovers labs for each of the major universities in turn, pausing between
 * universities to stay under provider rate limits.
 */
export async function populateMajorUniversities(
  deps: Partial<LabDiscoveryDeps> = {},
  options: PopulateOptions = {}
): Promise<LabRecord[]> {
  const log = deps.logger ?? createPrefixedLogger('[LabDiscovery]');
  const universities = options.universities ?? LAB_DISCOVERY_CONFIG.MAJOR_UNIVERSITIES;
  const limit = options.limit ?? LAB_DISCOVERY_CONFIG.MAJOR_UNIVERSITY_LIMIT;
  const delayMs = options.delayMs ?? LAB_DISCOVERY_CONFIG.DELAY_BETWEEN_UNIVERSITIES_MS;
  const pause = deps.sleep ?? defaultSleep;

  const allLabs: LabRecord[] = [];

  for (const university of universities) {
    if (deps.signal?.aborted) {
      log.warn('Lab population cancelled');
      break;
    }

    log.info(`Fetching labs for ${university}...`);
    const labs = await searchUniversityLabs(university, limit, { ...deps, logger: log });
    allLabs.push(...labs);
    log.info(`Found ${labs.length} labs for ${university}`);
    options.onUniversity?.(university, labs);

    await pause(delayMs);
  }

  return allLabs;
}

/**
 * Writes labs as pretty-printed JSON, creating the directory if needed.
 *
 * @returns The absolute path written
 */
export function saveLabsToFile(labs: readonly LabRecord[], filePath: string, logger?: Logger): string {
  const log = logger ?? createPrefixedLogger('[LabDiscovery]');
  const resolved = path.resolve(filePath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, JSON.stringify(labs, null, 2), 'utf-8');
  log.info(`Saved ${labs.length} labs to ${resolved}`);
  return resolved;
}
