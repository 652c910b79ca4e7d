export const ELIGIBILITY_RUBRIC_V1 = `Accept only when the candidate could credibly apply today:
- Most required competencies are present in their background.
- Their seniority is within one level of the role.
- Nothing in their stated preferences rules the role out.
Reject when in doubt.`;

export interface EligibilityPromptCandidate {
  id: string;
  title: string;
  company: string;
  seniority: string;
  required: string[];
  optional: string[];
  description: string;
}

export function buildEligibilityReviewV1Prompt(input: {
  subjectSummary: string;
  rubric: string;
  candidates: EligibilityPromptCandidate[];
}): string {
  return [
    "Task: decide whether the candidate is eligible for each job opening below.",
    "Return STRICT JSON only.",
    "",
    "Output schema:",
    "{",
    '  "judgments": [',
    "    {",
    '      "id": "opening id, copied exactly",',
    '      "accept": true,',
    '      "confidence": "low | medium | high",',
    '      "score": 0,',
    '      "reasoning": "one or two sentences"',
    "    }",
    "  ]",
    "}",
    "",
    "Rubric:",
    input.rubric,
    "",
    "- score is an integer from 0 to 100.",
    "- Return exactly one judgment per opening.",
    "",
    `Candidate:\n${input.subjectSummary}`,
    "",
    `Openings:\n${JSON.stringify(input.candidates, null, 2)}`,
  ].join("\n");
}
