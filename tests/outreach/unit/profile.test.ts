import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';

import { loadCharacterProfile } from '../../../src/ai/outreach/profile';
import { createMockLogger } from '../../utils/ai-mocks';

const DATA_DIR = fileURLToPath(new URL('../../../data/', import.meta.url));

const tempDirs: string[] = [];

function writeTempFile(name: string, content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'profile-test-'));
  tempDirs.push(dir);
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('loadCharacterProfile', () => {
  it('loads the bundled student profile', () => {
    const profile = loadCharacterProfile(path.join(DATA_DIR, 'student_cs.json'), createMockLogger());

    expect(profile?.name).toBe('Alex Morgan');
  });

  it('returns null for a missing file', () => {
    const logger = createMockLogger();

    expect(loadCharacterProfile('/nonexistent/student.json', logger)).toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('returns null for JSON that is not an object', () => {
    const logger = createMockLogger();
    const file = writeTempFile('student.json', '["robotics"]');

    expect(loadCharacterProfile(file, logger)).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(`Student profile at ${file} is not a JSON object`);
  });

  it('returns null for malformed JSON', () => {
    expect(loadCharacterProfile(writeTempFile('student.json', '{"name":'), createMockLogger())).toBeNull();
  });
});
