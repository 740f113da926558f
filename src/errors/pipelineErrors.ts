export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends PipelineError {}

export class SourceReadError extends PipelineError {
  constructor(
    readonly filePath: string,
    reason: string
  ) {
    super(`Unable to read "${filePath}": ${reason}`);
  }
}

export class SchemaMismatchError extends PipelineError {
  constructor(
    readonly filePath: string,
    readonly missingColumns: string[]
  ) {
    super(
      `"${filePath}" is missing column(s): ${missingColumns.join(", ")}`
    );
  }
}

export class FieldMissingError extends PipelineError {
  constructor(
    readonly stage: string,
    readonly missingColumns: string[]
  ) {
    super(`${stage}: missing column(s): ${missingColumns.join(", ")}`);
  }
}

export class EmptyGroupKeyError extends PipelineError {
  constructor(
    readonly groupColumn: string,
    readonly rowNumber: number
  ) {
    super(`Row ${rowNumber} has no value for "${groupColumn}"`);
  }
}

export class InvalidSchemaError extends PipelineError {}

export class ValidationFailureError extends PipelineError {
  constructor(readonly details: string) {
    super(`Shift payload failed schema validation: ${details}`);
  }
}

export class SubmissionError extends PipelineError {
  /** Needs already sent before this one failed. */
  submitted = 0;
  needId?: string;

  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
  }
}
