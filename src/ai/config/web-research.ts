/**
 * AI Configuration: Web Research
 *
 * Synthesizes a research brief about a person or topic from web search
 * results. Used to build the recipient info for outreach emails.
 *
 * Model configuration:
 * - Default model: AI_DEFAULT_MODELS.WEB_RESEARCH (utils.ts)
 * - Override via env: AI_MODEL_WEB_RESEARCH
 */

import type { AITaskConfig, SourceDigestEntry, WebResearchContext } from './types';
import { getModel } from './utils';

/**
 * Formats search results as a numbered list the model can cite by index.
 */
export function formatSourceDigest(sources: readonly SourceDigestEntry[]): string {
  if (sources.length === 0) {
    return 'No web sources were found for this query. Say so explicitly and only report what can be stated with confidence.';
  }
  return sources
    .map((source, index) => `[${index + 1}] ${source.title}\nURL: ${source.url}\n${source.snippet}`)
    .join('\n\n');
}

function buildPrompt(context: WebResearchContext): string {
  return `## Research Request
${context.query.trim()}

## Web Sources
${formatSourceDigest(context.sources)}

## Instructions
- Answer the research request using ONLY the sources above.
- Cite sources inline by their number, e.g. [2].
- Prefer concrete facts: current position, department, lab, research areas, notable publications, recent projects.
- Leave out anything you cannot attribute to a source.
- Plain text with short headings; no tables.`;
}

export const webResearchConfig: AITaskConfig<WebResearchContext> = {
  name: 'Web Research',
  description: 'Summarizes web search results into a factual research brief',
  get model() {
    return getModel('WEB_RESEARCH');
  },
  systemPrompt:
    'You are a meticulous research assistant. You read web search results and write accurate, well-attributed briefs about academics, labs and their work. You never invent people, titles, publications or contact details.',
  buildPrompt,
  temperature: 0.2,
  maxTokens: 1500,
};
