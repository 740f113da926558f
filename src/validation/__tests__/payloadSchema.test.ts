import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  InvalidSchemaError,
  SourceReadError,
  ValidationFailureError,
} from "../../errors/pipelineErrors";
import { FIXTURES, SCHEMA_FILE, captureConsole, writeTempFile } from "../../__tests__/helpers";
import {
  checkShiftPayload,
  loadJsonSchema,
  validateShiftPayload,
} from "../payloadSchema";

const shiftsArraySchema = {
  type: "object",
  additionalProperties: {
    type: "object",
    required: ["shifts"],
    properties: {
      shifts: { type: "array", items: { type: "object" } },
    },
  },
};

describe("validateShiftPayload", () => {
  let consoleSpy: ReturnType<typeof captureConsole>;

  beforeEach(() => {
    consoleSpy = captureConsole();
  });

  afterEach(() => {
    consoleSpy.log.mockRestore();
    consoleSpy.warn.mockRestore();
    consoleSpy.error.mockRestore();
  });

  it("accepts shifts given as an array of objects", () => {
    expect(validateShiftPayload({ "42": { shifts: [{ x: "y" }] } }, shiftsArraySchema)).toBe(true);
    expect(consoleSpy.warn).not.toHaveBeenCalled();
  });

  it("returns false instead of throwing when shifts is a string", () => {
    expect(validateShiftPayload({ "42": { shifts: "y" } }, shiftsArraySchema)).toBe(false);
    expect(consoleSpy.warn).toHaveBeenCalledWith(
      "⚠️ Shift payload does not match the schema: data/42/shifts must be array"
    );
  });

  it("throws instead when asked to fail on an invalid payload", () => {
    expect(() =>
      validateShiftPayload({ "42": { shifts: "y" } }, shiftsArraySchema, {
        failOnInvalid: true,
      })
    ).toThrowError(
      new ValidationFailureError("data/42/shifts must be array")
    );
    expect(consoleSpy.warn).not.toHaveBeenCalled();
  });

  it("rejects non-string shift fields under the bundled schema", async () => {
    const schema = await loadJsonSchema(SCHEMA_FILE);

    expect(validateShiftPayload({ "42": { shifts: [{ slots: "4" }] } }, schema)).toBe(true);
    expect(validateShiftPayload({ "42": { shifts: [{ slots: 4 }] } }, schema)).toBe(false);
    expect(validateShiftPayload({ "42": { shifts: [] } }, schema)).toBe(false);
    expect(validateShiftPayload({}, schema)).toBe(false);
  });
});

describe("checkShiftPayload", () => {
  it("returns the violation text alongside the flag", () => {
    expect(checkShiftPayload({ "7": {} }, shiftsArraySchema)).toEqual({
      valid: false,
      details: "data/7 must have required property 'shifts'",
    });
  });

  it("raises InvalidSchemaError for a schema ajv cannot compile", () => {
    expect(() => checkShiftPayload({}, { type: "nope" })).toThrowError(InvalidSchemaError);
  });
});

describe("loadJsonSchema", () => {
  it("reads the bundled schema", async () => {
    const schema = await loadJsonSchema(SCHEMA_FILE);

    expect(schema).toMatchObject({ type: "object", minProperties: 1 });
  });

  it("reports a missing schema file", async () => {
    await expect(loadJsonSchema(path.join(FIXTURES, "nope.json"))).rejects.toBeInstanceOf(
      SourceReadError
    );
  });

  it("reports a file that is not JSON", async () => {
    await expect(loadJsonSchema(path.join(FIXTURES, "shifts.csv"))).rejects.toBeInstanceOf(
      SourceReadError
    );
  });

  it("rejects a JSON document that is not a schema", async () => {
    const file = await writeTempFile("list.json", "[1, 2]");

    await expect(loadJsonSchema(file)).rejects.toBeInstanceOf(InvalidSchemaError);
  });
});
