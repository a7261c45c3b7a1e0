/**
 * AI Configuration: Lab Discovery
 *
 * Lists research labs at a university with their principal investigators.
 * The output is free-form text with labelled fields; lab-parser.ts turns it
 * into structured records, so the field labels in the prompt must stay in
 * sync with the parser's keywords.
 *
 * Model configuration:
 * - Default model: AI_DEFAULT_MODELS.LAB_DISCOVERY (utils.ts)
 * - Override via env: AI_MODEL_LAB_DISCOVERY
 */

import type { AITaskConfig, LabDiscoveryContext } from './types';
import { formatSourceDigest } from './web-research';
import { getModel } from './utils';

export function buildLabSearchPrompt(university: string, limit: number): string {
  return `Search comprehensively for research laboratories, research groups, and faculty research at ${university}.

IMPORTANT: For each lab, you MUST find and include the principal investigator's name. Use faculty directories, department pages, lab websites, and research center listings to identify the lead professor or director.

Please find specific research labs and provide the following information for each:
- Lab Name: [exact name of the research lab or group]
- Professor: [REQUIRED - full name and title of the principal investigator, lab director, or lead faculty member]
- Department: [specific academic department or school]
- Research Focus: [detailed description of research areas, current projects, methodologies, applications, and recent achievements - provide 2-3 sentences with specific details]
- Website: [lab website URL if available]
- Email: [contact email if available]

Search strategy:
1. Look at faculty directory pages for each department
2. Look for "${university} research labs faculty"
3. Look for "${university} principal investigators"
4. Check department websites for lab listings with faculty names
5. Look for research center pages that list lab directors

Focus on active research labs in computer science, engineering, biology, chemistry, physics, materials science, mathematics, and other STEM fields.

CRITICAL REQUIREMENTS:
1. Every lab entry MUST have a professor name - no exceptions
2. If you cannot find a professor name, DO NOT include that lab
3. Use multiple sources: faculty directories, lab websites, research center pages, department listings
4. Look for titles like: Professor, Dr., Principal Investigator, Lab Director, Research Scientist, Assistant Professor, Associate Professor
5. Verify professor names are real people, not generic titles or descriptions
6. Check "People", "Faculty", "Team", "About" sections of lab websites
7. If a lab page doesn't list the PI, look for that lab name in the university's faculty directory

Only provide labs where you have identified the principal investigator or lead faculty member.
Target: ${limit} research labs with complete information including verified professor names.

Number each lab entry ("1. <Lab Name>", "2. <Lab Name>", ...) and use the field labels above. Do not use markdown formatting like asterisks or bold text in the content - use plain text only.`;
}

function buildPrompt(context: LabDiscoveryContext): string {
  return `${buildLabSearchPrompt(context.university, context.limit)}

## Web Sources
${formatSourceDigest(context.sources)}`;
}

export const labDiscoveryConfig: AITaskConfig<LabDiscoveryContext> = {
  name: 'Lab Discovery',
  description: 'Lists research labs and their principal investigators at a university',
  get model() {
    return getModel('LAB_DISCOVERY');
  },
  systemPrompt:
    'You are a research assistant compiling a directory of university research labs from web sources. Report only labs and people that appear in the sources.',
  buildPrompt,
  temperature: 0.2,
  maxTokens: 4000,
};
