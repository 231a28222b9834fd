/**
 * Zustand store for the CLI render job.
 *
 * The reducer already uses Immer's produce() for immutable updates,
 * so the store itself does not need the immer middleware.
 *
 * One store per CLI run: the initial phase depends on whether the anomaly
 * percentage came from the command line.
 */

import { create } from "zustand";

import { reduce } from "./reducer.js";
import type { CliState, CliStore, Intent } from "./types.js";

// ---------------------------------------------------------------------------
// Initial state factory
// ---------------------------------------------------------------------------

export interface CliStoreOptions {
  /** Percentage from the command line, or null to prompt for it. */
  anomalyPct: number | null;
  fallbackPct: number;
}

export function createInitialState(opts: CliStoreOptions): CliState {
  return {
    phase: opts.anomalyPct === null ? "prompt" : "ready",
    anomalyInput: "",
    anomalyPct: opts.anomalyPct,
    fallbackPct: opts.fallbackPct,
    progress: { framesComposed: 0, totalFrames: 0, visibleCount: 0, numChars: 0 },
    summary: null,
    lastFrame: null,
    error: null,
  };
}

// ---------------------------------------------------------------------------
// Store creation
// ---------------------------------------------------------------------------

/**
 * Create the store.
 *
 * The returned hook works inside Ink components (`useCliStore((s) => s.phase)`)
 * and outside React (`useCliStore.getState().dispatch(...)`).
 */
export function createCliStore(opts: CliStoreOptions) {
  return create<CliStore>()((set, get) => ({
    ...createInitialState(opts),

    dispatch: (intent: Intent) => {
      const { dispatch: _, ...currentState } = get();
      const nextState = reduce(currentState, intent);
      set(nextState);
    },
  }));
}

export type CliStoreHook = ReturnType<typeof createCliStore>;

// Re-export types for convenience
export type { CliState, CliStore, Intent, RenderPhase } from "./types.js";
