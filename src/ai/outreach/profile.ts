import * as fs from 'fs';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { errorMessage, isRecord } from '../tools/parse-utils';
import type { CharacterProfile } from './types';

/**
 * Reads a student profile JSON file. Null when it is missing or not an object.
 */
export function loadCharacterProfile(
  filePath: string,
  log: Logger = createPrefixedLogger('[Profile]')
): CharacterProfile | null {
  try {
    const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (isRecord(data)) return data;
    log.warn(`Student profile at ${filePath} is not a JSON object`);
  } catch (error) {
    log.warn(`Could not load student profile from ${filePath}: ${errorMessage(error)}`);
  }
  return null;
}
