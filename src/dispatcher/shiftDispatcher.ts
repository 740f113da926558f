import { AxiosInstance } from "axios";
import { ShiftImportConfig } from "../config/env";
import { ShiftPayload } from "../types/shiftRow";
import {
  DryRunSender,
  HttpSender,
  ShiftRequestSender,
} from "./senders";
import { buildShiftRequest, createShiftsClient } from "./shiftRequest";

export interface SubmissionSummary {
  dryRun: boolean;
  /** Needs sent, or printed on a dry run. */
  submitted: number;
}

/**
 * Sends one request per need, in payload order. The first failure
 * stops the loop: creation calls are not safe to repeat, so later
 * needs are left unsent and the error reports how many went out.
 */
export class ShiftDispatcher {
  constructor(
    private readonly config: Pick<
      ShiftImportConfig,
      "baseUrl" | "token" | "httpTimeoutMs"
    >,
    private readonly sender: ShiftRequestSender
  ) {}

  get dryRun(): boolean {
    return this.sender.dryRun;
  }

  async submit(payload: ShiftPayload): Promise<SubmissionSummary> {
    let submitted = 0;

    for (const needId of payload.order) {
      const request = buildShiftRequest(
        this.config,
        needId,
        payload.needs[needId]
      );
      const result = await this.sender.send(request);

      if (!result.ok) {
        result.error.needId = needId;
        result.error.submitted = submitted;
        console.error(
          `❌ Need ${needId} failed after ${submitted} of ` +
            `${payload.order.length} need(s) submitted; stopping.`
        );
        throw result.error;
      }
      submitted++;
    }

    console.log(
      this.dryRun
        ? `🧪 Dry run: ${submitted} request(s) prepared, none sent`
        : `✅ Submitted shifts for ${submitted} need(s)`
    );
    return { dryRun: this.dryRun, submitted };
  }
}

export function createDispatcher(
  config: ShiftImportConfig,
  http?: AxiosInstance
): ShiftDispatcher {
  const sender = config.dryRun
    ? new DryRunSender()
    : new HttpSender(http ?? createShiftsClient(config));
  return new ShiftDispatcher(config, sender);
}
