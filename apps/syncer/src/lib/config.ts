import path from "node:path";
import { z } from "zod";

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .optional()
    .default(fallback)
    .transform((v) => !["false", "0", "no", "off"].includes(v.trim().toLowerCase()));

const idList = z
  .string()
  .optional()
  .default("")
  .transform(
    (v) =>
      new Set(
        v
          .split(",")
          .map((id) => id.trim())
          .filter((id) => id.length > 0),
      ),
  );

const envSchema = z.object({
  OUTPUT_DIRECTORY: z.string().min(1),
  TEMP_DIRECTORY: z.string().optional().default(""),
  LANGUAGE: z.string().min(1).default("en"),
  RENAME_CHAPTERS: booleanFlag("true"),
  RENAME_MANGA: booleanFlag("true"),
  ALLOW_QUESTION_MARKS: booleanFlag("false"),
  BLOCKED_GROUPS: idList,
  IGNORED_CHAPTERS: idList,
  PARALLEL_DOWNLOADS: z.coerce.number().int().min(1).max(32).default(4),
  API_BASE_URL: z.string().url().default("https://api.mangadex.org"),
  METADATA_DELAY_MS: z.coerce.number().int().min(0).default(1500),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "error"]).default("info"),
  LOG_FILE: z.string().optional().default(""),
});

export type AppConfig = z.infer<typeof envSchema> & {
  outputDirAbsolute: string;
  tempRootAbsolute: string | null;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    ...parsed,
    outputDirAbsolute: path.resolve(process.cwd(), parsed.OUTPUT_DIRECTORY),
    tempRootAbsolute: parsed.TEMP_DIRECTORY ? path.resolve(process.cwd(), parsed.TEMP_DIRECTORY) : null,
  };
}
