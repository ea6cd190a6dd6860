import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export function parseDotEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const separatorIndex = trimmed.indexOf("=");
  if (separatorIndex <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  let value = trimmed.slice(separatorIndex + 1).trim();

  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }

  return [key, value];
}

export interface LoadModeEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  existsSync?: (filePath: string) => boolean;
  readFileSync?: (filePath: string, encoding: "utf8") => string;
}

/**
 * Loads `.env.local` or `.env.prod` from the working directory without
 * overriding variables already present in the process environment.
 */
export function loadModeEnvFile(options: LoadModeEnvFileOptions = {}): string | null {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const existsSync = options.existsSync ?? fs.existsSync;
  const readFileSync = options.readFileSync ?? fs.readFileSync;
  const protectedKeys = new Set(
    Object.keys(processEnv).filter((key) => processEnv[key] !== undefined)
  );
  const rawMode = processEnv.APP_MODE?.trim().toLowerCase();
  const explicitMode = rawMode === "local" || rawMode === "prod" ? rawMode : undefined;

  const modeCandidates = explicitMode ? [explicitMode] : ["local", "prod"];
  const envFilePath = modeCandidates
    .map((mode) => path.join(cwd, `.env.${mode}`))
    .find((candidate) => existsSync(candidate));
  if (!envFilePath) {
    return null;
  }

  const content = readFileSync(envFilePath, "utf8");
  for (const line of content.split(/\r?\n/)) {
    const entry = parseDotEnvLine(line);
    if (!entry) {
      continue;
    }
    const [key, value] = entry;
    if (protectedKeys.has(key)) {
      continue;
    }
    processEnv[key] = value;
  }
  return envFilePath;
}

loadModeEnvFile();

const runtimeModeSchema = z.enum(["prod", "local"]);
const booleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
  });

const optionalTrimmedString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

export const envSchema = z
  .object({
    APP_MODE: runtimeModeSchema.default("local"),
    PORT: z.coerce.number().int().positive().default(3000),
    FRONTEND_ORIGIN: z.string().min(1).default("http://localhost:5173"),
    ENABLE_INFRA_BOOTSTRAP: booleanFlagSchema.default(false),
    RUN_STARTUP_CHECKS: booleanFlagSchema.default(false),
    OPENAI_API_KEY: optionalTrimmedString,
    OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
    OPENAI_SCOPE_MODEL: z.string().min(1).default("gpt-4o-mini"),
    OPENAI_AUDIT_MODEL: z.string().min(1).default("gpt-4o-mini"),
    OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
    OPENAI_EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
    INDEX_BACKEND: z.enum(["local", "qdrant"]).default("local"),
    INDEX_DIR: z.string().min(1).default("data/index"),
    QDRANT_URL: optionalTrimmedString,
    QDRANT_API_KEY: optionalTrimmedString,
    QDRANT_COLLECTION: z.string().min(1).default("cdc_chunks"),
    POSTGRES_URL: optionalTrimmedString,
    DEFAULT_TOP_K: z.coerce.number().int().positive().default(5),
    MAX_TOP_K: z.coerce.number().int().positive().default(10),
    MIN_EVIDENCE: z.coerce.number().int().positive().default(2),
    CLASSIFIER_TIMEOUT_MS: z.coerce.number().int().positive().default(4000),
    DRAFTER_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
    EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    AUDIT_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
    INTAKE_POLICY_FILE: optionalTrimmedString
  })
  .superRefine((value, ctx) => {
    if (value.INDEX_BACKEND === "qdrant" && !value.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required when INDEX_BACKEND=qdrant"
      });
    }
    if (value.DEFAULT_TOP_K > value.MAX_TOP_K) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DEFAULT_TOP_K"],
        message: "DEFAULT_TOP_K must not exceed MAX_TOP_K"
      });
    }
    if (value.MIN_EVIDENCE > value.MAX_TOP_K) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MIN_EVIDENCE"],
        message: "MIN_EVIDENCE must not exceed MAX_TOP_K"
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return parsed.data;
}

export const env: Env = parseEnv(process.env);
