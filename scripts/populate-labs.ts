/**
 * Lab Catalog Population
 *
 * Discovers labs at the major universities in LAB_DISCOVERY_CONFIG and writes
 * them to the catalog file the web app reads.
 *
 * Usage:
 *   npx tsx scripts/populate-labs.ts
 *
 * Optional env:
 *   LABS_DATA_PATH=data/labs.json
 *
 * Prerequisites: OPENROUTER_API_KEY, plus EXA_API_KEY and/or TAVILY_API_KEY
 */

import 'dotenv/config';

import { errorMessage, populateMajorUniversities, saveLabsToFile } from '../src/ai';
import { loadServerConfig } from '../src/config/server';

async function main(): Promise<void> {
  const { labsDataPath } = loadServerConfig();

  console.log('Populating lab data for major universities...');
  const labs = await populateMajorUniversities(
    {},
    { onUniversity: (university, found) => console.log(`  ${university}: ${found.length} labs`) }
  );

  const savedPath = saveLabsToFile(labs, labsDataPath);
  console.log(`\nSaved ${labs.length} labs to ${savedPath}`);
}

main().catch((err) => {
  console.error(`Lab population failed: ${errorMessage(err)}`);
  process.exit(1);
});
