/**
 * CLI render-job state and Intent discriminated union.
 */

import type { Frame } from "../spiral/types.js";

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

/**
 * prompt    -> waiting for the anomaly percentage
 * ready     -> percentage known, render not started
 * rendering -> frames being composed and written
 * done / empty / error -> terminal phases
 */
export type RenderPhase = "prompt" | "ready" | "rendering" | "done" | "empty" | "error";

export interface RenderProgress {
  framesComposed: number;
  totalFrames: number;
  visibleCount: number;
  numChars: number;
}

export interface RenderSummary {
  destination: string;
  frameCount: number;
  numChars: number;
}

export interface CliState {
  phase: RenderPhase;
  /** Raw text typed into the anomaly prompt. */
  anomalyInput: string;
  anomalyPct: number | null;
  /** Used when the typed percentage cannot be parsed. */
  fallbackPct: number;
  progress: RenderProgress;
  summary: RenderSummary | null;
  lastFrame: Frame | null;
  error: string | null;
}

// ---------------------------------------------------------------------------
// Intent types (discriminated union)
// ---------------------------------------------------------------------------

export interface SetAnomalyInputIntent {
  type: "SET_ANOMALY_INPUT";
  value: string;
}

export interface SubmitAnomalyIntent {
  type: "SUBMIT_ANOMALY";
}

export interface RenderStartedIntent {
  type: "RENDER_STARTED";
  totalFrames: number;
  numChars: number;
}

export interface FrameComposedIntent {
  type: "FRAME_COMPOSED";
  frameIndex: number;
  visibleCount: number;
}

export interface RenderFinishedIntent {
  type: "RENDER_FINISHED";
  summary: RenderSummary;
  lastFrame: Frame | null;
}

export interface RenderEmptyIntent {
  type: "RENDER_EMPTY";
}

export interface RenderFailedIntent {
  type: "RENDER_FAILED";
  message: string;
}

export type Intent =
  | SetAnomalyInputIntent
  | SubmitAnomalyIntent
  | RenderStartedIntent
  | FrameComposedIntent
  | RenderFinishedIntent
  | RenderEmptyIntent
  | RenderFailedIntent;

// ---------------------------------------------------------------------------
// Store shape
// ---------------------------------------------------------------------------

export interface CliStore extends CliState {
  dispatch: (intent: Intent) => void;
}

/** Longest accepted anomaly prompt input. */
export const MAX_ANOMALY_INPUT = 16;
