import { ZodError } from "zod";

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/** Splits "a, b,c" style lists from the environment. */
export function parseColumnList(input: string): string[] {
  return input
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function formatZodError(error: ZodError, source = "environment") {
  const messages = error.errors.map((err) => {
    const path = err.path.join(".");
    const expected =
      err.code === "invalid_type"
        ? `expected ${err.expected}, got ${err.received}`
        : "";
    return `${path} is ${err.message}${expected ? ` (${expected})` : ""}`;
  });

  return `Invalid ${source}: ${messages.join("; ")}`;
}
