import axios, { AxiosAdapter, AxiosInstance } from "axios";
import { ShiftImportConfig } from "../config/env";
import { PayloadFragment } from "../types/shiftRow";

export interface ShiftRequest {
  method: "POST";
  url: string;
  headers: Record<string, string>;
  body: PayloadFragment;
  timeoutMs: number;
}

export function buildShiftsUrl(baseUrl: string, needId: string): string {
  const base = baseUrl.replace(/\/+$/, "");
  return `${base}/needs/${encodeURIComponent(needId)}/shifts`;
}

export function buildShiftRequest(
  config: Pick<ShiftImportConfig, "baseUrl" | "token" | "httpTimeoutMs">,
  needId: string,
  body: PayloadFragment
): ShiftRequest {
  return {
    method: "POST",
    url: buildShiftsUrl(config.baseUrl, needId),
    headers: {
      Authorization: `Bearer ${config.token}`,
      Accept: "application/json",
      "Content-Type": "application/json",
    },
    body,
    timeoutMs: config.httpTimeoutMs,
  };
}

// Status codes are checked by HttpSender, so axios must not reject on them.
export function createShiftsClient(
  config: Pick<ShiftImportConfig, "httpTimeoutMs">,
  adapter?: AxiosAdapter
): AxiosInstance {
  return axios.create({
    timeout: config.httpTimeoutMs,
    validateStatus: () => true,
    ...(adapter ? { adapter } : {}),
  });
}
