import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { IntakePolicy } from "../modules/intake/types.js";

const currentFilePath = fileURLToPath(import.meta.url);
export const defaultIntakePolicyPath = path.resolve(
  path.dirname(currentFilePath),
  "../../config/intake-policy.json"
);

const severitySchema = z.enum(["block", "warn"]);
const termListSchema = z.array(z.string().trim().min(1)).default([]);

export const intakePolicySchema = z.object({
  severity: z.object({
    national_tax_id: severitySchema,
    company_id: severitySchema,
    email: severitySchema,
    phone: severitySchema,
    case_number: severitySchema
  }),
  maskToken: z.string().min(1),
  warningDisplay: z.enum(["show", "log"]).default("log"),
  scopeTerms: z.object({
    inScope: termListSchema,
    adjacentLegal: termListSchema,
    legalMarkers: termListSchema,
    sensitive: termListSchema
  })
});

export function parseIntakePolicy(raw: unknown): IntakePolicy {
  const parsed = intakePolicySchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "policy"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid intake policy:\n${details}`);
  }
  return parsed.data;
}

export function loadIntakePolicy(
  filePath: string = defaultIntakePolicyPath,
  readFileSync: (filePath: string, encoding: "utf8") => string = fs.readFileSync
): IntakePolicy {
  const content = readFileSync(filePath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid json";
    throw new Error(`Intake policy ${filePath} is not valid JSON: ${message}`);
  }
  return parseIntakePolicy(raw);
}
