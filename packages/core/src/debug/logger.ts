// ── Debug Log ──────────────────────────────────────────────────

export type DebugPhase = 'metadata' | 'join-resolution' | 'sql-generation' | 'execution'

export interface DebugLogEntry {
  timestamp: number
  phase: DebugPhase
  message: string
  details?: unknown
}

export type DebugSink = (entry: DebugLogEntry) => void

export function debugEntry(phase: DebugPhase, message: string, durationMs?: number, details?: unknown): DebugLogEntry {
  const result: DebugLogEntry = {
    timestamp: Date.now(),
    phase,
    message: durationMs === undefined ? message : `${message} (${durationMs.toFixed(1)}ms)`,
  }
  if (details !== undefined) result.details = details
  return result
}

/** Sink that collects entries into an array. */
export function withDebugLog(): { sink: DebugSink; log: DebugLogEntry[] } {
  const log: DebugLogEntry[] = []
  return { sink: (entry) => log.push(entry), log }
}
