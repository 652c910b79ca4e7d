export const JSON_REPAIR_V1_PROMPT = `Fix a broken JSON reply so it parses.

Input fields:
- schema_hint: a short description of the object the caller expects.
- raw: the reply that failed to parse.

Rules:
- Output one JSON object and nothing else.
- Preserve every key and value that can be recovered from raw.
- No markdown, no code fences, no explanations.
- Fill fields that cannot be recovered with null or an empty array.`;

export function buildJsonRepairV1Prompt(input: { schemaHint: string; raw: string }): string {
  return [
    JSON_REPAIR_V1_PROMPT,
    "",
    "Input:",
    JSON.stringify(
      {
        schema_hint: input.schemaHint,
        raw: input.raw.slice(0, 6000),
      },
      null,
      2,
    ),
  ].join("\n");
}
