import { z } from "zod";
import { SchemaError } from "./errors";
import type { Confidence, Severity } from "./types";

const lowercase = (value: string) => value.trim().toLowerCase();

export const confidenceSchema = z.union([
  z.number().min(0).max(1),
  z.string().transform(lowercase).pipe(z.enum(["high", "medium", "low"])),
]);

export const severitySchema = z
  .string()
  .transform(lowercase)
  .pipe(z.enum(["critical", "high", "medium", "low"]));

const vulnerableJudgment = z.object({
  vulnerable: z.literal(true),
  confidence: confidenceSchema,
  condition: z.string().trim().min(1),
  explanation: z.string(),
  severity: severitySchema.optional(),
});

const safeJudgment = z.object({
  vulnerable: z.literal(false),
  confidence: confidenceSchema.optional(),
  condition: z.string().optional(),
  explanation: z.string().optional(),
  severity: severitySchema.optional(),
});

export const judgmentSchema = z.discriminatedUnion("vulnerable", [vulnerableJudgment, safeJudgment]);

export interface ParsedJudgment {
  vulnerable: boolean;
  confidence: Confidence | null;
  severity: Severity | null;
  condition: string;
  explanation: string;
}

/**
 * Pulls the JSON object out of a completion, tolerating Markdown fences
 * and prose around it.
 */
export function extractJsonObject(responseText: string): string {
  let text = responseText.trim();
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) {
    text = fenced[1].trim();
  }

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end < start) {
    throw new SchemaError("Response contains no JSON object", responseText);
  }
  return text.slice(start, end + 1);
}

/**
 * Parses a judgment completion into its verdict fields.
 *
 * @throws SchemaError when the text is not JSON or does not match the schema.
 */
export function parseJudgmentResponse(responseText: string): ParsedJudgment {
  const json = extractJsonObject(responseText);

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SchemaError(`Response is not valid JSON: ${message}`, responseText);
  }

  const result = judgmentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new SchemaError(`Response does not match the verdict schema: ${issues}`, responseText);
  }

  const judgment = result.data;
  return {
    vulnerable: judgment.vulnerable,
    confidence: judgment.confidence ?? null,
    severity: judgment.severity ?? null,
    condition: judgment.condition ?? "",
    explanation: judgment.explanation ?? "",
  };
}
