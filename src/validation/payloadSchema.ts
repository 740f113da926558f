import Ajv, { Schema, ValidateFunction } from "ajv";
import fs from "fs-extra";
import { z } from "zod";
import {
  InvalidSchemaError,
  SourceReadError,
  ValidationFailureError,
} from "../errors/pipelineErrors";

const SchemaDocument = z.custom<Schema>(
  (value) =>
    typeof value === "boolean" ||
    (typeof value === "object" && value !== null && !Array.isArray(value))
);

export interface PayloadValidation {
  valid: boolean;
  /** ajv's error text; empty when valid. */
  details: string;
}

export async function loadJsonSchema(filePath: string): Promise<Schema> {
  if (!(await fs.pathExists(filePath))) {
    throw new SourceReadError(filePath, "file does not exist");
  }

  const raw: unknown = await fs.readJson(filePath).catch((err: Error) => {
    throw new SourceReadError(filePath, err.message);
  });

  const parsed = SchemaDocument.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidSchemaError(
      `${filePath} is not a JSON Schema document (expected an object)`
    );
  }
  return parsed.data;
}

function compileSchema(ajv: Ajv, schema: Schema): ValidateFunction {
  try {
    return ajv.compile(schema);
  } catch (err) {
    throw new InvalidSchemaError((err as Error).message);
  }
}

export function checkShiftPayload(
  payload: unknown,
  schema: Schema
): PayloadValidation {
  const ajv = new Ajv({ allErrors: true });
  const validate = compileSchema(ajv, schema);

  if (validate(payload)) {
    return { valid: true, details: "" };
  }
  return { valid: false, details: ajv.errorsText(validate.errors) };
}

export interface ValidateOptions {
  /** Throw ValidationFailureError instead of returning false. */
  failOnInvalid?: boolean;
}

/**
 * Pass/fail check of the payload against the schema. By default
 * violations are logged for the operator, never thrown.
 */
export function validateShiftPayload(
  payload: unknown,
  schema: Schema,
  { failOnInvalid = false }: ValidateOptions = {}
): boolean {
  const { valid, details } = checkShiftPayload(payload, schema);
  if (!valid) {
    if (failOnInvalid) {
      throw new ValidationFailureError(details);
    }
    console.warn(`⚠️ Shift payload does not match the schema: ${details}`);
  }
  return valid;
}
