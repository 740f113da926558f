import { AxiosInstance } from "axios";
import fs from "fs-extra";
import { ShiftImportConfig } from "../config/env";
import {
  ShiftDispatcher,
  SubmissionSummary,
  createDispatcher,
} from "../dispatcher/shiftDispatcher";
import { groupShifts, toShiftPayload } from "../grouping/shiftGrouper";
import { normalizeShiftTable } from "../normalizer/shiftNormalizer";
import { loadShiftTable } from "../parser/csvParser";
import { ShiftPayload } from "../types/shiftRow";
import {
  loadJsonSchema,
  validateShiftPayload,
} from "../validation/payloadSchema";

export interface PipelineOptions {
  /** HTTP client used when not on a dry run. */
  http?: AxiosInstance;
}

function declaredColumns({ columns }: ShiftImportConfig): string[] {
  const fromFile = [
    columns.needId,
    columns.startDate,
    columns.startTime,
    ...columns.drop,
    ...columns.keep.filter((c) => c !== columns.start),
  ];
  return [...new Set(fromFile)];
}

/**
 * Loads, normalizes, groups and validates one shift export. Use
 * {@link ShiftPipeline.build}; a pipeline only exists once every stage
 * has succeeded.
 */
export class ShiftPipeline {
  private constructor(
    readonly payload: ShiftPayload,
    readonly isValid: boolean,
    private readonly dispatcher: ShiftDispatcher
  ) {}

  static async build(
    config: ShiftImportConfig,
    options: PipelineOptions = {}
  ): Promise<ShiftPipeline> {
    const { columns } = config;

    const table = await loadShiftTable(
      config.inputFile,
      declaredColumns(config)
    );
    const normalized = normalizeShiftTable(table, {
      dateColumn: columns.startDate,
      timeColumn: columns.startTime,
      startColumn: columns.start,
      dropColumns: columns.drop,
    });
    const groups = groupShifts(normalized, columns.needId, columns.keep);
    const payload = toShiftPayload(groups, config.shiftsKey);

    if (config.writeOutputFile) {
      await fs.outputJson(config.outputFile, payload.needs, { spaces: 2 });
      console.log(`📝 Wrote payload to ${config.outputFile}`);
    }

    const schema = await loadJsonSchema(config.schemaFile);
    const valid = validateShiftPayload(payload.needs, schema, {
      failOnInvalid: config.failOnInvalidPayload,
    });

    const needCount = payload.order.length;
    console.log(
      `✅ Prepared ${normalized.rows.length} shift(s) for ${needCount} need(s)`
    );
    return new ShiftPipeline(
      payload,
      valid,
      createDispatcher(config, options.http)
    );
  }

  get shiftCount(): number {
    return this.payload.order.reduce(
      (total, needId) =>
        total +
        Object.values(this.payload.needs[needId]).reduce(
          (n, shifts) => n + shifts.length,
          0
        ),
      0
    );
  }

  submit(): Promise<SubmissionSummary> {
    return this.dispatcher.submit(this.payload);
  }
}
