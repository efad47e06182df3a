import { vi } from "vitest";

export const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

export type FetchCall = { url: string; init?: RequestInit };

/** Replaces global fetch with a router keyed by exact URL; unknown URLs answer 404. */
export const stubFetch = (routes: Record<string, () => Response | Promise<Response>>) => {
  const calls: FetchCall[] = [];
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    calls.push({ url, init });
    const route = routes[url];
    return route ? route() : jsonResponse("Not found", 404);
  });
  vi.stubGlobal("fetch", fetchMock);
  return { calls, fetchMock };
};
