import { afterEach, describe, expect, it, vi } from "vitest";
import { createMemoryLogger } from "../test/logger.js";
import { jsonResponse, stubFetch } from "../test/http.js";
import { PropertyService, type ServiceConfig } from "./service.js";

const config: ServiceConfig = {
  dataUrl: "https://example.local/properties",
  propertiesUrl: "https://example.local/listings",
  complaintsUrl: "https://example.local/complaints",
  apiKey: "test-secret",
  apiKeyHeader: "Authorization",
  apiKeyPrefix: "Bearer",
  requestTimeoutMs: 1000
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("PropertyService", () => {
  it("reads ratings and listings from their own endpoints", async () => {
    const { calls } = stubFetch({
      "https://example.local/properties": () => jsonResponse([{ id: "1" }]),
      "https://example.local/listings": () => jsonResponse({ data: [{ id: "2" }] })
    });
    const service = new PropertyService(config, createMemoryLogger().logger);

    expect(await service.listRatedProperties()).toEqual([{ id: "1" }]);
    expect(await service.listProperties()).toEqual([{ id: "2" }]);
    expect(calls[0].init?.headers).toMatchObject({ Authorization: "Bearer test-secret" });
  });

  it("degrades to an empty list and logs an error on HTTP 500", async () => {
    stubFetch({ "https://example.local/properties": () => jsonResponse({}, 500) });
    const { logger, entries } = createMemoryLogger();
    const service = new PropertyService(config, logger);

    await expect(service.listRatedProperties()).resolves.toEqual([]);
    expect(entries).toEqual([
      {
        level: "error",
        message: "Failed to fetch properties: Request failed (500)",
        meta: { reason: "http", url: "https://example.local/properties", status: 500 }
      }
    ]);
  });

  it("logs a warning for an unexpected payload shape", async () => {
    stubFetch({ "https://example.local/properties": () => jsonResponse({ rows: [] }) });
    const { logger, entries } = createMemoryLogger();
    const service = new PropertyService(config, logger);

    expect(await service.listRatedProperties()).toEqual([]);
    expect(entries.map((entry) => entry.level)).toEqual(["warn"]);
    expect(entries[0].message).toBe("Failed to fetch properties: Unexpected payload format, returning empty result");
  });

  it("returns null for an unknown property", async () => {
    stubFetch({ "https://example.local/properties": () => jsonResponse([{ id: "1" }]) });
    const service = new PropertyService(config, createMemoryLogger().logger);
    expect(await service.getProperty("2")).toBeNull();
  });

  it("queries complaints by property id", async () => {
    const { calls } = stubFetch({
      "https://example.local/complaints?property_id=3": () => jsonResponse([{ id: "c1" }])
    });
    const service = new PropertyService(config, createMemoryLogger().logger);
    expect(await service.listComplaints("3")).toEqual([{ id: "c1" }]);
    expect(calls.map((call) => call.url)).toEqual(["https://example.local/complaints?property_id=3"]);
  });

  it("skips the complaints request when no endpoint is configured", async () => {
    const { fetchMock } = stubFetch({});
    const service = new PropertyService({ ...config, complaintsUrl: null }, createMemoryLogger().logger);
    expect(service.complaintsEnabled).toBe(false);
    expect(await service.listComplaints("3")).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
