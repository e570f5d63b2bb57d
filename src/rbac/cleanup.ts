/**
 * Teardown of everything a run created, newest first
 */

import type { AzureClients } from "../azure/clients.js";
import { isNotFound } from "../azure/clients.js";
import { logger } from "../logging.js";
import { retry, linearRetry } from "../retry.js";

export interface CleanupAction {
  description: string;
  run(clients: AzureClients): Promise<void>;
}

export type CleanupStatus = "deleted" | "already-gone" | "failed";

export interface CleanupOutcome {
  description: string;
  status: CleanupStatus;
  attempts: number;
  error?: string;
}

export interface CleanupSummary {
  succeeded: number;
  failed: number;
  outcomes: CleanupOutcome[];
}

export interface CleanupOptions {
  attempts: number;
  intervalMs: number;
}

export class CleanupRegistry {
  private readonly registered: CleanupAction[] = [];

  register(description: string, run: (clients: AzureClients) => Promise<unknown>): void {
    this.registered.push({
      description,
      run: async clients => {
        await run(clients);
      },
    });
    logger.debug(`Registered cleanup: ${description}`);
  }

  get size(): number {
    return this.registered.length;
  }

  /** Actions in execution order (reverse of registration) */
  pending(): CleanupAction[] {
    return [...this.registered].reverse();
  }
}

/**
 * Run every registered action with the operator's clients. A failing action is
 * retried at a fixed interval, then recorded; later actions still run.
 */
export async function runCleanup(
  registry: CleanupRegistry,
  clients: AzureClients,
  options: CleanupOptions
): Promise<CleanupSummary> {
  const outcomes: CleanupOutcome[] = [];

  for (const action of registry.pending()) {
    let attempts = 0;
    try {
      const status = await retry(
        async () => {
          attempts++;
          try {
            await action.run(clients);
            return "deleted" as const;
          } catch (error) {
            if (isNotFound(error)) {
              return "already-gone" as const;
            }
            throw error;
          }
        },
        linearRetry(options.attempts, options.intervalMs),
        `cleanup: ${action.description}`
      );
      outcomes.push({ description: action.description, status, attempts });
      logger.info(`Cleanup ${status}: ${action.description}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      outcomes.push({ description: action.description, status: "failed", attempts, error: message });
      logger.error(`Cleanup failed: ${action.description}`, { attempts, error: message });
    }
  }

  const failed = outcomes.filter(o => o.status === "failed").length;
  return {
    succeeded: outcomes.length - failed,
    failed,
    outcomes,
  };
}
