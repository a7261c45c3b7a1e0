/**
 * Single-University Lab Search
 *
 * Usage:
 *   npx tsx scripts/search-labs.ts "University of Texas at Dallas" [limit]
 *
 * Prerequisites: OPENROUTER_API_KEY, plus EXA_API_KEY and/or TAVILY_API_KEY
 */

import 'dotenv/config';

import { errorMessage, LAB_DISCOVERY_CONFIG, searchUniversityLabs } from '../src/ai';

async function main(): Promise<void> {
  const [university, rawLimit] = process.argv.slice(2);
  if (!university) {
    console.error('Usage: search-labs.ts "<university>" [limit]');
    process.exit(1);
  }

  const parsedLimit = rawLimit ? Number.parseInt(rawLimit, 10) : LAB_DISCOVERY_CONFIG.DEFAULT_LIMIT;
  const limit = Number.isFinite(parsedLimit) && parsedLimit > 0 ? parsedLimit : LAB_DISCOVERY_CONFIG.DEFAULT_LIMIT;

  console.log(`Searching for labs at ${university}...`);
  const labs = await searchUniversityLabs(university, limit);

  console.log(`\nFound ${labs.length} labs:\n`);
  labs.forEach((lab, i) => {
    console.log(`${i + 1}. ${lab.name}`);
    console.log(`   Professor: ${lab.professor}`);
    console.log(`   Department: ${lab.department ?? 'N/A'}`);
    console.log(`   Email: ${lab.professor_email || 'N/A'}`);
    console.log(`   URL: ${lab.url || 'N/A'}`);
    console.log(`   Description: ${lab.description}\n`);
  });
}

main().catch((err) => {
  console.error(`Lab search failed: ${errorMessage(err)}`);
  process.exit(1);
});
