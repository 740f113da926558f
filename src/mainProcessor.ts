import { ShiftImportConfig } from "./config/env";
import { SubmissionSummary } from "./dispatcher/shiftDispatcher";
import { PipelineOptions, ShiftPipeline } from "./pipeline/shiftPipeline";

export interface ProcessResult {
  valid: boolean;
  needs: number;
  shifts: number;
  summary: SubmissionSummary;
}

export async function processShiftFile(
  config: ShiftImportConfig,
  options: PipelineOptions = {}
): Promise<ProcessResult> {
  const pipeline = await ShiftPipeline.build(config, options);
  const summary = await pipeline.submit();

  return {
    valid: pipeline.isValid,
    needs: pipeline.payload.order.length,
    shifts: pipeline.shiftCount,
    summary,
  };
}
