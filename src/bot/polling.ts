import { setTimeout as delay } from "timers/promises";
import type { DispatchDeps } from "./dispatch.js";
import { handleUpdate } from "./dispatch.js";
import type { TelegramClient } from "./telegram.js";
import { parseUpdate } from "./updates.js";

export type PollingDeps = DispatchDeps & {
  client: DispatchDeps["client"] & Pick<TelegramClient, "getUpdates">;
  pollTimeoutSeconds?: number;
  retryDelayMs?: number;
};

const readUpdateId = (raw: unknown): number | null => {
  if (typeof raw !== "object" || raw === null || !("update_id" in raw)) return null;
  return typeof raw.update_id === "number" ? raw.update_id : null;
};

/**
 * Long-polls getUpdates until `signal` aborts. Updates are handled one at a
 * time; the offset moves past every update seen, including unparseable ones.
 */
export const runPolling = async (deps: PollingDeps, signal: AbortSignal): Promise<void> => {
  let offset = 0;
  const timeout = deps.pollTimeoutSeconds ?? 30;

  while (!signal.aborted) {
    let batch: unknown[];
    try {
      batch = await deps.client.getUpdates(offset, timeout, signal);
    } catch (error) {
      if (signal.aborted) break;
      deps.logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        "getUpdates failed, retrying"
      );
      try {
        await delay(deps.retryDelayMs ?? 3000, undefined, { signal });
      } catch (sleepError) {
        if (signal.aborted) break;
        throw sleepError;
      }
      continue;
    }

    for (const raw of batch) {
      const updateId = readUpdateId(raw);
      if (updateId !== null) offset = Math.max(offset, updateId + 1);
      const update = parseUpdate(raw);
      if (!update) {
        deps.logger.warn({ updateId }, "Skipping malformed update");
        continue;
      }
      await handleUpdate(update, deps);
    }
  }
};
