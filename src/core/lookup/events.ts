// src/core/lookup/events.ts
// Lookup ledger: bounded event log plus running counters

import type { LookupConfig } from "../config/config";
import type { LookupEvent, LookupStats } from "./types";

const DEFAULT_LOG_LIMIT = 1000;

const eventLog: LookupEvent[] = [];
let logLimit = DEFAULT_LOG_LIMIT;
let logEnabled = true;

const stats: LookupStats = {
  hits: 0,
  scans: 0,
  comparisons: 0,
  failures: 0,
};

/**
 * Set the ledger size and switch event recording on or off.
 * Counters are always kept.
 */
export function configureLookupLog(options: { limit?: number; enabled?: boolean }): void {
  if (options.limit !== undefined) {
    logLimit = Math.max(0, Math.floor(options.limit));
    trimLog();
  }
  if (options.enabled !== undefined) {
    logEnabled = options.enabled;
  }
}

/**
 * Apply the ledger settings of a loaded config. The ledger is shared by the
 * whole process, so call this once at startup.
 */
export function applyLookupConfig(config: LookupConfig): void {
  configureLookupLog({ limit: config.logLimit, enabled: config.logEnabled });
}

/**
 * Log a lookup event and update the counters.
 */
export function logLookupEvent(event: LookupEvent): void {
  switch (event.tag) {
    case "hit":
      stats.hits++;
      break;
    case "scan":
      stats.scans++;
      stats.comparisons += event.comparisons;
      break;
    case "fail":
      stats.failures++;
      stats.comparisons += event.comparisons;
      break;
  }

  if (!logEnabled) return;
  eventLog.push(event);
  trimLog();
}

function trimLog(): void {
  if (eventLog.length > logLimit) {
    eventLog.splice(0, eventLog.length - logLimit);
  }
}

/**
 * Get recent events, oldest first.
 */
export function getRecentEvents(limit: number = 100): LookupEvent[] {
  return limit <= 0 ? [] : eventLog.slice(-limit);
}

/**
 * Count logged events by type.
 */
export function countEvents(tag: LookupEvent["tag"]): number {
  return eventLog.filter(e => e.tag === tag).length;
}

export function getLookupStats(): LookupStats {
  return { ...stats };
}

/**
 * Clear the event log and counters (for testing).
 */
export function clearLookupLog(): void {
  eventLog.length = 0;
  stats.hits = 0;
  stats.scans = 0;
  stats.comparisons = 0;
  stats.failures = 0;
}
