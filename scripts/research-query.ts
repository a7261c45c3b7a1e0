/**
 * Web Research CLI
 *
 * Usage:
 *   npx tsx scripts/research-query.ts "Give me information about <name> from <university>"
 *   npx tsx scripts/research-query.ts --person "<name>" "<affiliation>"
 *
 * Prerequisites: OPENROUTER_API_KEY, plus EXA_API_KEY and/or TAVILY_API_KEY
 */

import 'dotenv/config';

import { buildRecipientResearchQuery, errorMessage, researchQuery } from '../src/ai';

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  let query: string;
  if (args[0] === '--person' && args[1]) {
    query = buildRecipientResearchQuery(args[1], args[2]);
  } else {
    query = args.join(' ').trim();
  }

  if (!query) {
    console.error('Usage: research-query.ts "<query>" | --person "<name>" ["<affiliation>"]');
    process.exit(1);
  }

  const result = await researchQuery(query);
  console.log(result.text);
  if (result.sources.length > 0) {
    console.log('\nSources:');
    result.sources.forEach((url, i) => console.log(`  [${i + 1}] ${url}`));
  }
}

main().catch((err) => {
  console.error(`Research failed: ${errorMessage(err)}`);
  process.exit(1);
});
