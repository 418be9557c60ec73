// src/services/session.ts
// One aggregation run exposed as an observable three-state lifecycle.

import {
  aggregateCountries,
  freezeGrouped,
  type AggregationResult,
  type GroupedResult,
} from "./aggregate";
import { describeError } from "./errors";
import { logError } from "./log";

export type SessionState =
  | { readonly status: "loading" }
  | { readonly status: "loaded"; readonly regions: GroupedResult }
  | { readonly status: "error"; readonly message: string };

export type SessionListener = (state: SessionState) => void;

export type RunAggregation = (signal: AbortSignal) => Promise<AggregationResult>;

const LOADING: SessionState = Object.freeze({ status: "loading" });

/**
 * The session is the only writer of its state; readers get frozen snapshots
 * via getSnapshot/subscribe. `loaded` and `error` are terminal: retrying
 * means building a new session.
 */
export class CountrySession {
  private state: SessionState = LOADING;
  private readonly listeners = new Set<SessionListener>();
  private readonly controller = new AbortController();
  private running: Promise<void> | null = null;

  constructor(private readonly runAggregation: RunAggregation = defaultRun) {}

  getSnapshot = (): SessionState => this.state;

  subscribe = (listener: SessionListener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  get cancelled() {
    return this.controller.signal.aborted;
  }

  /** Starts the run once; later calls return the same promise. */
  run(): Promise<void> {
    this.running ??= this.execute();
    return this.running;
  }

  /** Abort outstanding requests; nothing is published afterwards. */
  cancel() {
    this.controller.abort();
  }

  private async execute() {
    let next: SessionState;
    try {
      const result = await this.runAggregation(this.controller.signal);
      next = result.ok
        ? { status: "loaded", regions: freezeGrouped(Object.entries(result.regions)) }
        : { status: "error", message: `Failed to load data: ${describeError(result.error)}` };
      if (!result.ok && !this.cancelled) logError(result.error, "session");
    } catch (err) {
      if (!this.cancelled) logError(err, "session");
      next = { status: "error", message: `Failed to load data: ${describeError(err)}` };
    }
    if (this.cancelled) return;
    this.publish(next);
  }

  private publish(next: SessionState) {
    if (this.state.status !== "loading") return;
    this.state = Object.freeze(next);
    this.listeners.forEach((l) => l(next));
  }
}

function defaultRun(signal: AbortSignal) {
  return aggregateCountries(undefined, { signal });
}

export function createCountrySession(run?: RunAggregation) {
  return new CountrySession(run);
}
