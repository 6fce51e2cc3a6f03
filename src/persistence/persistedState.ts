import type { ErrorKind } from "../types.js";

export type StatsPersistedState = {
  runs: number;
  successfulRuns: number;
  failedRuns: number;
  chickenedRuns: number;
  totalRunMs: number;
  deaths: number;
  chickens: number;
  errorsByKind: Partial<Record<ErrorKind, number>>;
};

export type GovernorPersistedState = {
  dedupe?: Record<string, number>; // key -> timestamp when sent
};

/**
 * Persisted state schema (versioned)
 */
export interface PersistedEngineStateV1 {
  version: 1;
  instanceId: string;
  savedAt: number;
  stats: StatsPersistedState;
  governor: GovernorPersistedState;
}

export type PersistedEngineState = PersistedEngineStateV1;
