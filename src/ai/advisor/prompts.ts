/**
 * Advisor prompt
 */

import { ADVISOR_CONFIG } from '../config/pipeline';
import type { LabRecord } from '../labs/types';
import type { AdvisorStudent } from './types';

/**
 * Compact YAML-like summary of the first MAX_LABS_IN_PROMPT labs.
 */
export function buildLabsContext(labs: readonly LabRecord[]): string {
  return labs
    .slice(0, ADVISOR_CONFIG.MAX_LABS_IN_PROMPT)
    .map(
      (lab) =>
        `- name: ${lab.name}\n` +
        `  professor: ${lab.professor}\n` +
        `  professor_email: ${lab.professor_email}\n` +
        `  school: ${lab.school}\n` +
        `  url: ${lab.url}\n` +
        `  description: ${lab.description}`
    )
    .join('\n');
}

/**
 * The transcript is sent in its own capped section, so it is left out of the
 * profile JSON.
 */
function profileJson(student: AdvisorStudent): string {
  const { transcript_text: _transcript, ...profile } = student;
  return JSON.stringify(profile);
}

export function buildAdvisorPrompt(student: AdvisorStudent, labs: readonly LabRecord[]): string {
  const transcriptText = (student.transcript_text ?? '').trim();
  const coursework = student.coursework ?? [];

  return `You are an expert academic advisor. Produce ONLY valid JSON with this shape:

{
  "recommendations": [
    {
      "name": "string",
      "professor": "string",
      "professor_email": "string",
      "school": "string",
      "url": "string",
      "description": "string",
      "relevance_score": 0,
      "skills": ["string"],
      "coursework": ["string"]
    }
  ]
}

Rules:
- Return 2–3 items.
- Always include "professor_email". If missing, infer "firstname.lastname@institution.edu".
- description must concisely include: why it matches, skills to highlight, and next steps.
- Use ONLY labs from the provided list (use exact names/professors).
- Use transcript/coursework to tailor the match and list specific classes/skills.

Student profile (JSON):
${profileJson(student)}

Transcript text (if any):
${transcriptText.slice(0, ADVISOR_CONFIG.MAX_TRANSCRIPT_CHARS)}

Coursework hints (if any): ${JSON.stringify(coursework)}

Available labs (summaries):
${buildLabsContext(labs)}`.trim();
}
