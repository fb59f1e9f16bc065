export const JSON_REPAIR_V1_PROMPT = `A scoring call returned output that is not a valid JSON object.
Rewrite it as one.

Input fields:
- schema_hint: the shape the caller expects.
- raw: the broken output.

Rules:
- Output a single JSON object and nothing else. No markdown fences.
- Preserve every score, list entry and key present in raw.
- Never invent scores. A score that cannot be recovered becomes null.
- A missing list becomes an empty array.`;

export function buildJsonRepairV1Prompt(input: { schemaHint: string; raw: string }): string {
  return [
    JSON_REPAIR_V1_PROMPT,
    "",
    "Input JSON:",
    JSON.stringify({ schema_hint: input.schemaHint, raw: input.raw }, null, 2),
  ].join("\n");
}
