import axios, { AxiosInstance } from "axios";
import { SubmissionError } from "../errors/pipelineErrors";
import { formatJson } from "../utils/formating";
import { ShiftRequest } from "./shiftRequest";

export type SendResult =
  | { ok: true; status?: number }
  | { ok: false; error: SubmissionError };

export interface ShiftRequestSender {
  readonly dryRun: boolean;
  send(request: ShiftRequest): Promise<SendResult>;
}

/** Prints each request instead of sending it. */
export class DryRunSender implements ShiftRequestSender {
  readonly dryRun = true;

  async send(request: ShiftRequest): Promise<SendResult> {
    console.log(
      "\n** HTTP API Dry Run **\n\n" +
        `URL: '${request.url}'\n` +
        "Payload:\n" +
        formatJson(request.body)
    );
    return { ok: true };
  }
}

function statusFailure(
  url: string,
  status: number,
  statusText: string
): SendResult {
  return {
    ok: false,
    error: new SubmissionError(
      `HTTP ${status} ${statusText} from ${url}`,
      status
    ),
  };
}

export class HttpSender implements ShiftRequestSender {
  readonly dryRun = false;

  constructor(private readonly http: AxiosInstance) {}

  async send(request: ShiftRequest): Promise<SendResult> {
    try {
      const response = await this.http.request({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
        timeout: request.timeoutMs,
      });

      if (response.status < 200 || response.status >= 300) {
        return statusFailure(
          request.url,
          response.status,
          response.statusText
        );
      }

      console.log(`HTTP ${response.status} ${response.statusText}`);
      return { ok: true, status: response.status };
    } catch (err) {
      // clients that reject non-2xx responses themselves
      if (axios.isAxiosError(err) && err.response) {
        return statusFailure(
          request.url,
          err.response.status,
          err.response.statusText
        );
      }
      const message = axios.isAxiosError(err)
        ? `${err.code ?? "request failed"}: ${err.message}`
        : (err as Error).message;
      return {
        ok: false,
        error: new SubmissionError(`POST ${request.url} failed (${message})`),
      };
    }
  }
}
