import { z } from "zod";
import type { AppConfig } from "../shared/config.js";
import { isDataRecord, isEmptyRecord, type DataRecord } from "../shared/record.js";

export type FetchFailureReason = "timeout" | "network" | "http" | "parse" | "shape";

export type FetchFailure = {
  reason: FetchFailureReason;
  url: string;
  message: string;
  status?: number;
};

export type FetchResult<T> = { ok: true; status: number; value: T } | { ok: false; failure: FetchFailure };

export type FetchOptions = {
  headers: Record<string, string>;
  timeoutMs: number;
};

const USER_AGENT = "propwatch/0.1 (+https://example.local)";

// Some mock APIs wrap the list: { "data": [...] }
const RecordListSchema = z.union([z.array(z.unknown()), z.object({ data: z.array(z.unknown()) })]);

const fail = (reason: FetchFailureReason, url: string, message: string, status?: number): FetchResult<never> => ({
  ok: false,
  failure: status === undefined ? { reason, url, message } : { reason, url, message, status }
});

export const buildHeaders = (config: Pick<AppConfig, "apiKey" | "apiKeyHeader" | "apiKeyPrefix">) => {
  const headers: Record<string, string> = {
    Accept: "application/json",
    "User-Agent": USER_AGENT
  };
  if (config.apiKey) {
    const prefix = config.apiKeyPrefix ? `${config.apiKeyPrefix} ` : "";
    headers[config.apiKeyHeader] = `${prefix}${config.apiKey}`;
  }
  return headers;
};

/**
 * GETs a URL and decodes the JSON body. Non-2xx answers come back as an
 * `http` failure carrying the status; nothing here throws.
 */
export const fetchJson = async (url: string, options: FetchOptions): Promise<FetchResult<unknown>> => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);
  try {
    let response: Response;
    try {
      response = await fetch(url, { headers: options.headers, signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted) {
        return fail("timeout", url, `Request timed out after ${options.timeoutMs}ms`);
      }
      return fail("network", url, error instanceof Error ? error.message : String(error));
    }

    if (!response.ok) {
      return fail("http", url, `Request failed (${response.status})`, response.status);
    }

    try {
      const value: unknown = await response.json();
      return { ok: true, status: response.status, value };
    } catch (error) {
      if (controller.signal.aborted) {
        return fail("timeout", url, `Request timed out after ${options.timeoutMs}ms`);
      }
      return fail("parse", url, error instanceof Error ? error.message : "Invalid JSON body", response.status);
    }
  } finally {
    clearTimeout(timer);
  }
};

export const extractRecords = (payload: unknown): DataRecord[] | null => {
  const parsed = RecordListSchema.safeParse(payload);
  if (!parsed.success) return null;
  const items = Array.isArray(parsed.data) ? parsed.data : parsed.data.data;
  return items.filter(isDataRecord);
};

export const fetchRecords = async (url: string, options: FetchOptions): Promise<FetchResult<DataRecord[]>> => {
  const result = await fetchJson(url, options);
  if (!result.ok) return result;
  const records = extractRecords(result.value);
  if (!records) {
    return fail("shape", url, "Unexpected payload format", result.status);
  }
  return { ok: true, status: result.status, value: records };
};

const trimSlashes = (url: string) => url.replace(/\/+$/, "");

/**
 * Tries `<baseUrl>/<id>` first. Any HTTP status other than 200 falls back to
 * listing `baseUrl` and matching ids as strings; `null` means not found, and
 * so does an empty object.
 */
export const fetchRecordById = async (
  baseUrl: string,
  id: string,
  options: FetchOptions
): Promise<FetchResult<DataRecord | null>> => {
  const singleUrl = `${trimSlashes(baseUrl)}/${encodeURIComponent(id)}`;
  const direct = await fetchJson(singleUrl, options);

  if (direct.ok && direct.status === 200) {
    if (!isDataRecord(direct.value)) {
      return fail("shape", singleUrl, "Expected a single record object", direct.status);
    }
    return { ok: true, status: direct.status, value: isEmptyRecord(direct.value) ? null : direct.value };
  }
  // Timeouts, network errors and unreadable 200 bodies carry no other status to fall back on.
  if (!direct.ok && (direct.failure.status === undefined || direct.failure.status === 200)) {
    return direct;
  }

  const listed = await fetchRecords(baseUrl, options);
  if (!listed.ok) return listed;
  const match = listed.value.find((record) => String(record.id) === id);
  return { ok: true, status: listed.status, value: match ?? null };
};

export const buildComplaintsUrl = (complaintsUrl: string, propertyId: string) =>
  `${trimSlashes(complaintsUrl)}?property_id=${encodeURIComponent(propertyId)}`;
