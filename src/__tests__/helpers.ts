import { AxiosAdapter, InternalAxiosRequestConfig } from "axios";
import os from "os";
import path from "path";
import fs from "fs-extra";
import { vi } from "vitest";
import { ShiftImportConfig } from "../config/env";
import { createShiftsClient } from "../dispatcher/shiftRequest";

export const FIXTURES = path.resolve(__dirname, "fixtures");
export const SCHEMA_FILE = path.resolve(__dirname, "../../schemas/shifts.schema.json");

export function testConfig(
  overrides: Partial<ShiftImportConfig> = {}
): ShiftImportConfig {
  return {
    baseUrl: "https://api.example.test/api",
    token: "test-token",
    inputFile: path.join(FIXTURES, "shifts.csv"),
    outputFile: path.join(os.tmpdir(), "shift-import-test", "shifts.json"),
    schemaFile: SCHEMA_FILE,
    columns: {
      needId: "need_id",
      startDate: "start_date",
      startTime: "start_time",
      start: "start",
      drop: ["need_title", "start_date", "start_time"],
      keep: ["start", "duration", "slots"],
    },
    shiftsKey: "shifts",
    dryRun: true,
    writeOutputFile: false,
    failOnInvalidPayload: false,
    httpTimeoutMs: 3000,
    uploadDir: path.join(os.tmpdir(), "shift-import-test", "uploads"),
    port: 0,
    ...overrides,
  };
}

const STATUS_TEXT: Record<number, string> = {
  201: "Created",
  422: "Unprocessable Entity",
  500: "Internal Server Error",
};

/** In-process stand-in for the scheduling API; replies with `statuses` in turn. */
export function fakeApi(statuses: number[] = []) {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const status = statuses[calls.length - 1] ?? 201;
    return {
      data: {},
      status,
      statusText: STATUS_TEXT[status] ?? "",
      headers: {},
      config,
    };
  };

  return { http: createShiftsClient({ httpTimeoutMs: 3000 }, adapter), calls };
}

export function captureConsole() {
  const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
  const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
  const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

  return {
    log,
    warn,
    error,
    output: () => log.mock.calls.map((args) => args.map(String).join(" ")).join("\n"),
  };
}

export async function writeTempFile(name: string, content: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "shift-import-"));
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, content, "utf-8");
  return filePath;
}
