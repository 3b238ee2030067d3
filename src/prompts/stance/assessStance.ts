/**
 * Stance judgment for one piece of evidence.
 *
 * Scores how the text positions its author on a climate policy question,
 * on a five-point scale from strongly opposing to strongly supporting.
 */

import type { PromptDefinition } from '../types';

export interface AssessStanceInput {
  question: string;
  evidence: string;
  /** Company the evidence is attributed to */
  subject?: string;
}

export const assessStancePrompt: PromptDefinition<AssessStanceInput> = {
  id: 'assess-stance',
  version: 1,
  description: 'Score one evidence passage against a policy question on a -2..2 scale',

  build: ({ question, evidence, subject }) => {
    const subjectSection = subject
      ? `
Here is the company in question:
${subject}
`
      : '';

    return `You are an analyst assessing corporate engagement with climate policy.

Read the evidence below and judge the stance it expresses on the policy question.
${subjectSection}
POLICY QUESTION:
${question}

EVIDENCE:
"""
${evidence}
"""

SCORING:
  2 = strongly supporting: explicit, unqualified support or advocacy
  1 = supporting: support with caveats, or support implied by stated actions
  0 = neutral: no clear position, mixed, or not about the question
 -1 = opposing: reservations, calls to weaken or delay
 -2 = strongly opposing: explicit opposition or lobbying against

Judge only what the evidence says. Do not use outside knowledge about the company.

Respond with JSON: {"evidence_scores": [{"score": <integer -2..2>, "reason": "<one or two sentences citing the evidence>"}]}`;
  },
};
