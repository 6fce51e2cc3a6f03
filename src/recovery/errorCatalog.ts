import type { BotState, ErrorKind, ErrorSeverity } from "../types.js";

export type RecoveryAction =
  | "random-escape" // click/move somewhere random to shake loose
  | "wait-and-retry" // give the observation pipeline time to catch up
  | "cancel-and-retry" // close whatever UI swallowed the input, then wait
  | "end-of-run-handoff" // ask for the run to wrap up so town logic can deal with it
  | "none";

export type CatalogEntry = {
  severity: ErrorSeverity;
  recovery: RecoveryAction;
  runEndState: BotState;
  description: string;
};

export type ErrorCatalog = Readonly<Record<ErrorKind, CatalogEntry>>;

/**
 * Classification table. Adding a kind means adding a row here (and to the
 * ErrorKind union); the coordinator's control flow does not change.
 */
export const DEFAULT_ERROR_CATALOG: ErrorCatalog = Object.freeze({
  stuck: {
    severity: "Recoverable",
    recovery: "random-escape",
    runEndState: "RETURNING",
    description: "Character has not moved for a full detection window",
  },
  "observation-timeout": {
    severity: "Recoverable",
    recovery: "wait-and-retry",
    runEndState: "RETURNING",
    description: "Observation port returned UNKNOWN or did not answer in time",
  },
  "action-timeout": {
    severity: "Recoverable",
    recovery: "cancel-and-retry",
    runEndState: "RETURNING",
    description: "Action port did not confirm an action in time",
  },
  "inventory-full": {
    severity: "Recoverable",
    recovery: "end-of-run-handoff",
    runEndState: "RETURNING",
    description: "No free inventory space for pickups",
  },
  "health-sample-timeout": {
    severity: "Recoverable",
    recovery: "none",
    runEndState: "RETURNING",
    description: "Health readout could not be sampled in time",
  },
  "character-death": {
    severity: "RunEnding",
    recovery: "none",
    runEndState: "DEAD",
    description: "Character died",
  },
  disconnect: {
    severity: "RunEnding",
    recovery: "none",
    runEndState: "DISCONNECTED",
    description: "Lost connection to the game server",
  },
  "unknown-state": {
    severity: "RunEnding",
    recovery: "none",
    runEndState: "DISCONNECTED",
    description: "Observed screen does not match any state the bot can be in",
  },
  "handler-fault": {
    severity: "RunEnding",
    recovery: "none",
    runEndState: "RETURNING",
    description: "A domain handler failed unexpectedly",
  },
  "escape-failed": {
    severity: "RunEnding",
    recovery: "none",
    runEndState: "CHICKENED",
    description: "One emergency exit method failed",
  },
  "escape-exhausted": {
    severity: "Critical",
    recovery: "none",
    runEndState: "CHICKENED",
    description: "Every emergency exit method failed",
  },
  "process-crash": {
    severity: "Critical",
    recovery: "none",
    runEndState: "ERROR",
    description: "Game process exited",
  },
});

export function classify(kind: ErrorKind, catalog: ErrorCatalog = DEFAULT_ERROR_CATALOG): CatalogEntry {
  // A kind missing from a custom catalog is treated as fatal.
  return (
    catalog[kind] ?? {
      severity: "Critical",
      recovery: "none",
      runEndState: "ERROR",
      description: `Unclassified error kind ${kind}`,
    }
  );
}
