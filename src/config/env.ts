import path from "path";
import { z } from "zod";
import { ConfigError } from "../errors/pipelineErrors";
import { formatZodError, parseColumnList } from "../utils/formating";

export const HTTP_TIMEOUT_MS = 3000;

export interface ColumnConfig {
  /** Column holding the need id shifts are grouped by. */
  needId: string;
  startDate: string;
  startTime: string;
  /** Synthesized from startDate and startTime. */
  start: string;
  drop: string[];
  keep: string[];
}

export interface ShiftImportConfig {
  baseUrl: string;
  token: string;
  inputFile: string;
  outputFile: string;
  schemaFile: string;
  columns: ColumnConfig;
  shiftsKey: string;
  dryRun: boolean;
  writeOutputFile: boolean;
  failOnInvalidPayload: boolean;
  httpTimeoutMs: number;
  uploadDir: string;
  port: number;
}

const flag = (fallback: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["true", "false", "1", "0"]))
    .optional()
    .transform((v) => (v === undefined ? fallback : v === "true" || v === "1"));

const columnList = (fallback: string) =>
  z.string().default(fallback).transform(parseColumnList);

const EnvSchema = z
  .object({
    BASE_URL: z.string().url(),
    GC_TOKEN: z.string().optional(),
    DRY_RUN: flag(true),
    WRITE_OUTPUT_FILE: flag(false),
    FAIL_ON_INVALID_PAYLOAD: flag(false),
    BASE_FILE_PATH: z.string().default("."),
    INPUT_FILE_DIR: z.string().default("input"),
    OUTPUT_FILE_DIR: z.string().default("output"),
    BASE_FILE_NAME: z.string().default("shifts"),
    INPUT_FILE_EXTENSION: z.string().default(".csv"),
    OUTPUT_FILE_EXTENSION: z.string().default(".json"),
    JSON_SCHEMA_DIR: z.string().default("schemas"),
    JSON_SCHEMA_SHIFT_FILE: z.string().default("shifts.schema.json"),
    GROUP_BY_COLUMN: z.string().default("need_id"),
    START_COLUMN: z.string().default("start"),
    START_DATE_COLUMN: z.string().default("start_date"),
    START_TIME_COLUMN: z.string().default("start_time"),
    DROP_COLUMNS: columnList("start_date, start_time"),
    KEEP_COLUMNS: columnList("start, duration, slots"),
    SHIFTS_DICT_KEY_NAME: z.string().default("shifts"),
    UPLOAD_DIR: z.string().default("uploads"),
    PORT: z.coerce.number().int().positive().default(3300),
  })
  .superRefine((env, ctx) => {
    if (!env.DRY_RUN && !env.GC_TOKEN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GC_TOKEN"],
        message: "required unless DRY_RUN is true",
      });
    }
  });

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): ShiftImportConfig {
  // dotenv turns `KEY=` into an empty string; treat it as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== "")
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(formatZodError(parsed.error));
  }
  const e = parsed.data;

  const inputBase = path.join(
    e.BASE_FILE_PATH,
    e.INPUT_FILE_DIR,
    e.BASE_FILE_NAME
  );
  const outputBase = path.join(
    e.BASE_FILE_PATH,
    e.OUTPUT_FILE_DIR,
    e.BASE_FILE_NAME
  );

  return {
    baseUrl: e.BASE_URL,
    token: e.GC_TOKEN ?? "",
    inputFile: `${inputBase}${e.INPUT_FILE_EXTENSION}`,
    outputFile: `${outputBase}${e.OUTPUT_FILE_EXTENSION}`,
    schemaFile: path.join(e.JSON_SCHEMA_DIR, e.JSON_SCHEMA_SHIFT_FILE),
    columns: {
      needId: e.GROUP_BY_COLUMN,
      startDate: e.START_DATE_COLUMN,
      startTime: e.START_TIME_COLUMN,
      start: e.START_COLUMN,
      drop: e.DROP_COLUMNS,
      keep: e.KEEP_COLUMNS,
    },
    shiftsKey: e.SHIFTS_DICT_KEY_NAME,
    dryRun: e.DRY_RUN,
    writeOutputFile: e.WRITE_OUTPUT_FILE,
    failOnInvalidPayload: e.FAIL_ON_INVALID_PAYLOAD,
    httpTimeoutMs: HTTP_TIMEOUT_MS,
    uploadDir: e.UPLOAD_DIR,
    port: e.PORT,
  };
}
