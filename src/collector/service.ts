import type { AppConfig } from "../shared/config.js";
import type { Logger } from "../shared/logger.js";
import type { DataRecord } from "../shared/record.js";
import {
  buildComplaintsUrl,
  buildHeaders,
  fetchRecordById,
  fetchRecords,
  type FetchFailure,
  type FetchOptions,
  type FetchResult
} from "./fetcher.js";

export type ServiceConfig = Pick<
  AppConfig,
  "dataUrl" | "propertiesUrl" | "complaintsUrl" | "apiKey" | "apiKeyHeader" | "apiKeyPrefix" | "requestTimeoutMs"
>;

/**
 * Read side of the data source. Every failure is logged here and turned into
 * an empty result, so callers only ever see data or "nothing".
 */
export class PropertyService {
  private readonly options: FetchOptions;

  constructor(
    private readonly config: ServiceConfig,
    private readonly logger: Logger
  ) {
    this.options = {
      headers: buildHeaders(config),
      timeoutMs: config.requestTimeoutMs
    };
  }

  get complaintsEnabled(): boolean {
    return Boolean(this.config.complaintsUrl);
  }

  async listRatedProperties(): Promise<DataRecord[]> {
    const result = await fetchRecords(this.config.dataUrl, this.options);
    return this.unwrap(result, [], "Failed to fetch properties");
  }

  async listProperties(): Promise<DataRecord[]> {
    const result = await fetchRecords(this.config.propertiesUrl, this.options);
    return this.unwrap(result, [], "Failed to fetch properties list");
  }

  async getProperty(id: string): Promise<DataRecord | null> {
    const result = await fetchRecordById(this.config.dataUrl, id, this.options);
    return this.unwrap(result, null, `Failed to fetch property ${id}`);
  }

  async listComplaints(propertyId: string): Promise<DataRecord[]> {
    if (!this.config.complaintsUrl) return [];
    const url = buildComplaintsUrl(this.config.complaintsUrl, propertyId);
    const result = await fetchRecords(url, this.options);
    return this.unwrap(result, [], `Failed to fetch complaints for property ${propertyId}`);
  }

  private unwrap<T>(result: FetchResult<T>, fallback: T, context: string): T {
    if (result.ok) return result.value;
    this.report(result.failure, context);
    return fallback;
  }

  private report(failure: FetchFailure, context: string) {
    const meta = { reason: failure.reason, url: failure.url, status: failure.status };
    if (failure.reason === "shape") {
      this.logger.warn(meta, `${context}: ${failure.message}, returning empty result`);
      return;
    }
    this.logger.error(meta, `${context}: ${failure.message}`);
  }
}
