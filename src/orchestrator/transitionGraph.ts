import type { BotState, Observation } from "../types.js";

export type TransitionGuard = {
  name: string;
  test: (observation: Observation | null) => boolean;
};

export type TransitionEdge = {
  from: BotState;
  to: BotState;
  guard?: TransitionGuard;
};

/**
 * Immutable directed graph of legal (from, to) pairs. Built once; no
 * mutators exist after construction.
 */
export class TransitionGraph {
  private readonly edges: ReadonlyMap<BotState, ReadonlyMap<BotState, TransitionGuard | null>>;

  constructor(edges: TransitionEdge[]) {
    const map = new Map<BotState, Map<BotState, TransitionGuard | null>>();
    for (const edge of edges) {
      if (edge.from === edge.to) {
        throw new Error(`Self-transition ${edge.from} -> ${edge.to} is not allowed in the graph`);
      }
      let targets = map.get(edge.from);
      if (!targets) {
        targets = new Map();
        map.set(edge.from, targets);
      }
      if (targets.has(edge.to)) {
        throw new Error(`Duplicate edge ${edge.from} -> ${edge.to}`);
      }
      targets.set(edge.to, edge.guard ?? null);
    }
    this.edges = map;
    Object.freeze(this);
  }

  has(from: BotState, to: BotState): boolean {
    return this.edges.get(from)?.has(to) ?? false;
  }

  guardFor(from: BotState, to: BotState): TransitionGuard | null {
    return this.edges.get(from)?.get(to) ?? null;
  }

  targetsOf(from: BotState): BotState[] {
    return [...(this.edges.get(from)?.keys() ?? [])];
  }

  size(): number {
    let n = 0;
    for (const targets of this.edges.values()) n += targets.size;
    return n;
  }
}

export type GraphGuardOptions = {
  minHealthToStartRun: number;
};

const IN_RUN: BotState[] = ["RUNNING", "FIGHTING", "LOOTING", "RETURNING"];

function observedLabel(label: string): TransitionGuard {
  return {
    name: `label=${label}`,
    test: (obs) => obs?.label === label,
  };
}

function healthAtLeast(percent: number): TransitionGuard {
  return {
    name: `health>=${percent}`,
    // No health readout means the detector cannot see the globe; let the run start.
    test: (obs) => {
      const health = obs?.readouts.health;
      return typeof health !== "number" || health >= percent;
    },
  };
}

function fanOut(from: BotState, targets: BotState[]): TransitionEdge[] {
  return targets.map((to) => ({ from, to }));
}

/**
 * Default graph. STOPPED is terminal and reachable from everywhere except
 * itself; ERROR only leads back to IDLE (after an operator resume).
 */
export function buildDefaultGraph(opts: GraphGuardOptions): TransitionGraph {
  const edges: TransitionEdge[] = [
    ...fanOut("IDLE", ["STARTING"]),
    { from: "STARTING", to: "IN_TOWN", guard: observedLabel("in_town") },
    ...fanOut("STARTING", ["DISCONNECTED", "ERROR"]),
    { from: "IN_TOWN", to: "RUNNING", guard: healthAtLeast(opts.minHealthToStartRun) },
    ...fanOut("IN_TOWN", ["MANAGING_INVENTORY", "LEVELING_UP", "STARTING", "DISCONNECTED", "ERROR"]),
    ...fanOut("RUNNING", ["FIGHTING", "LOOTING", "RETURNING", "DEAD", "CHICKENED", "DISCONNECTED", "ERROR"]),
    ...fanOut("FIGHTING", ["RUNNING", "LOOTING", "RETURNING", "DEAD", "CHICKENED", "DISCONNECTED", "ERROR"]),
    ...fanOut("LOOTING", ["RUNNING", "FIGHTING", "RETURNING", "DEAD", "CHICKENED", "DISCONNECTED", "ERROR"]),
    { from: "RETURNING", to: "IN_TOWN", guard: observedLabel("in_town") },
    ...fanOut("RETURNING", ["DEAD", "CHICKENED", "DISCONNECTED", "ERROR"]),
    ...fanOut("MANAGING_INVENTORY", ["IN_TOWN", "ERROR"]),
    ...fanOut("LEVELING_UP", ["IN_TOWN", "RUNNING", "ERROR"]),
    ...fanOut("DEAD", ["STARTING", "IN_TOWN", "ERROR"]),
    ...fanOut("CHICKENED", ["STARTING", "IN_TOWN", "ERROR"]),
    ...fanOut("DISCONNECTED", ["STARTING", "ERROR"]),
    ...fanOut("ERROR", ["IDLE"]),
  ];

  const all: BotState[] = [
    "IDLE", "STARTING", "IN_TOWN", "RUNNING", "FIGHTING", "LOOTING", "RETURNING",
    "MANAGING_INVENTORY", "LEVELING_UP", "DEAD", "CHICKENED", "DISCONNECTED", "ERROR",
  ];
  for (const from of all) edges.push({ from, to: "STOPPED" });

  return new TransitionGraph(edges);
}

export function isInRunState(state: BotState): boolean {
  return IN_RUN.includes(state);
}
