/**
 * Pure reducer for the CLI render job.
 *
 * Uses Immer's produce() so handlers can write mutating syntax
 * while producing immutable snapshots.
 */

import { castDraft, produce } from "immer";

import { parseAnomalyPercent } from "../spiral/anomaly.js";
import type { CliState, Intent } from "./types.js";
import { MAX_ANOMALY_INPUT } from "./types.js";

const TERMINAL_PHASES = new Set(["done", "empty", "error"]);

export function reduce(state: CliState, intent: Intent): CliState {
  return produce(state, (draft) => {
    switch (intent.type) {
      case "SET_ANOMALY_INPUT": {
        if (draft.phase !== "prompt") return;
        draft.anomalyInput = intent.value.slice(0, MAX_ANOMALY_INPUT);
        return;
      }

      case "SUBMIT_ANOMALY": {
        if (draft.phase !== "prompt") return;
        draft.anomalyPct = parseAnomalyPercent(draft.anomalyInput, draft.fallbackPct);
        draft.phase = "ready";
        return;
      }

      case "RENDER_STARTED": {
        if (draft.phase !== "ready") return;
        draft.phase = "rendering";
        draft.progress = {
          framesComposed: 0,
          totalFrames: intent.totalFrames,
          visibleCount: 0,
          numChars: intent.numChars,
        };
        return;
      }

      case "FRAME_COMPOSED": {
        if (draft.phase !== "rendering") return;
        draft.progress.framesComposed = Math.max(
          draft.progress.framesComposed,
          intent.frameIndex + 1,
        );
        draft.progress.visibleCount = intent.visibleCount;
        return;
      }

      case "RENDER_FINISHED": {
        if (TERMINAL_PHASES.has(draft.phase)) return;
        draft.phase = "done";
        draft.summary = intent.summary;
        draft.lastFrame = castDraft(intent.lastFrame);
        return;
      }

      case "RENDER_EMPTY": {
        if (TERMINAL_PHASES.has(draft.phase)) return;
        draft.phase = "empty";
        return;
      }

      case "RENDER_FAILED": {
        if (TERMINAL_PHASES.has(draft.phase)) return;
        draft.phase = "error";
        draft.error = intent.message;
        return;
      }
    }
  });
}
