import type { DebugLogEntry } from '@/types/bridge';

export const DEBUG_LOG_LIMIT = 20;

/**
 * Returns a new log with `message` appended. Once the log holds
 * `limit` entries the oldest ones are dropped first.
 */
export function appendDebugEntry(
  log: readonly DebugLogEntry[],
  message: string,
  timestamp = Date.now(),
  limit = DEBUG_LOG_LIMIT
): DebugLogEntry[] {
  const lastId = log.length > 0 ? log[log.length - 1].id : 0;
  const next = [...log, { id: lastId + 1, timestamp, message }];
  return next.length > limit ? next.slice(next.length - limit) : next;
}

export function formatDebugEntry(entry: DebugLogEntry) {
  const time = new Date(entry.timestamp).toISOString().slice(11, 23);
  return `[${time}] ${entry.message}`;
}
