export const JSON_REPAIR_V1_PROMPT = `You fix broken JSON produced by another prompt.

Input:
- schema_hint: plain text description of the expected object.
- raw: the malformed output.

Rules:
- Return one valid JSON object only.
- Keep keys and values from raw wherever possible.
- Replace single-quoted strings with double-quoted strings.
- Do not wrap the output in markdown.
- Do not add commentary.
- If a value cannot be recovered, omit the key.`;

export function buildJsonRepairV1Prompt(input: {
  schemaHint: string;
  raw: string;
}): string {
  return [
    JSON_REPAIR_V1_PROMPT,
    "",
    "Input JSON:",
    JSON.stringify(
      {
        schema_hint: input.schemaHint,
        raw: input.raw.slice(0, 8000),
      },
      null,
      2,
    ),
  ].join("\n");
}
