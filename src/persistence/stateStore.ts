import { promises as fs } from "node:fs";
import path from "node:path";
import type { PersistedEngineState } from "./persistedState.js";
import { describeError } from "../utils/errors.js";

function getDefaultStateFile(instanceId: string): string {
  return `/tmp/autopilot-state-${instanceId}.json`;
}

function isPersistedState(value: unknown): value is PersistedEngineState {
  if (typeof value !== "object" || value === null) return false;
  return (
    Reflect.get(value, "version") === 1 &&
    typeof Reflect.get(value, "stats") === "object" &&
    typeof Reflect.get(value, "governor") === "object"
  );
}

export class StateStore {
  private stateFile: string;

  constructor(instanceId: string, stateFile?: string) {
    this.stateFile = stateFile || getDefaultStateFile(instanceId);
  }

  getPath(): string {
    return this.stateFile;
  }

  async load(): Promise<PersistedEngineState | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.stateFile, "utf8");
    } catch (err: unknown) {
      // File doesn't exist yet - that's fine
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      console.warn(`[persist] Failed to load state: ${describeError(err)}`);
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      if (!isPersistedState(parsed)) {
        const version = typeof parsed === "object" && parsed !== null ? Reflect.get(parsed, "version") : undefined;
        console.warn(`[persist] Unsupported state version: ${String(version)}, ignoring`);
        return null;
      }
      return parsed;
    } catch (err: unknown) {
      console.warn(`[persist] Failed to parse state: ${describeError(err)}`);
      return null;
    }
  }

  async save(state: PersistedEngineState): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.stateFile), { recursive: true });
      await fs.writeFile(this.stateFile, JSON.stringify(state, null, 2) + "\n", "utf8");
    } catch (err: unknown) {
      console.warn(`[persist] Failed to save state: ${describeError(err)}`);
      throw err;
    }
  }
}
