/**
 * Root Ink component for a single render run.
 *
 * Phases: prompt for the anomaly percentage (unless given on the command
 * line), compose and write the frames, then show a preview of the last
 * frame and exit.
 */

import React, { useCallback, useEffect } from "react";
import { Box, Text, useApp } from "ink";

import { frameCount, type SpiralConfig } from "../lib/spiral/config.js";
import { renderSpiralAnimation } from "../lib/spiral/render.js";
import type { FrameSink } from "../lib/spiral/types.js";
import type { CliStoreHook } from "../lib/store/index.js";
import { bannerColor, statusColor, themeText } from "../lib/theme/ink-colors.js";
import { normalizeText, splitCharacters } from "../lib/utils/text.js";
import { AnomalyPrompt } from "./components/AnomalyPrompt.js";
import { FramePreview } from "./components/FramePreview.js";
import { RenderProgress } from "./components/RenderProgress.js";

export interface AppProps {
  text: string;
  /** Where the text came from (shown in the header). */
  sourceLabel: string;
  config: SpiralConfig;
  sink: FrameSink;
  store: CliStoreHook;
}

const TERMINAL_PHASES = new Set(["done", "empty", "error"]);

export function App({ text, sourceLabel, config, sink, store }: AppProps) {
  const { exit } = useApp();

  const phase = store((s) => s.phase);
  const anomalyInput = store((s) => s.anomalyInput);
  const anomalyPct = store((s) => s.anomalyPct);
  const progress = store((s) => s.progress);
  const summary = store((s) => s.summary);
  const lastFrame = store((s) => s.lastFrame);
  const error = store((s) => s.error);
  const dispatch = store((s) => s.dispatch);

  const onChange = useCallback(
    (value: string) => dispatch({ type: "SET_ANOMALY_INPUT", value }),
    [dispatch],
  );
  const onSubmit = useCallback(() => dispatch({ type: "SUBMIT_ANOMALY" }), [dispatch]);

  // ------------------------------------------------------------------
  // Render job: starts once the anomaly percentage is known
  // ------------------------------------------------------------------

  useEffect(() => {
    if (phase !== "ready") return;

    dispatch({
      type: "RENDER_STARTED",
      totalFrames: frameCount(config),
      numChars: splitCharacters(normalizeText(text)).length,
    });

    renderSpiralAnimation({
      text,
      anomalyPct: store.getState().anomalyPct ?? config.fallbackAnomalyPct,
      config,
      sink,
      onFrame: (frame) =>
        dispatch({
          type: "FRAME_COMPOSED",
          frameIndex: frame.index,
          visibleCount: frame.visibleCount,
        }),
    })
      .then((result) => {
        if (result.status === "empty") {
          dispatch({ type: "RENDER_EMPTY" });
          return;
        }
        dispatch({
          type: "RENDER_FINISHED",
          summary: {
            destination: result.destination,
            frameCount: result.frameCount,
            numChars: result.numChars,
          },
          lastFrame: result.lastFrame,
        });
      })
      .catch((err: unknown) => {
        dispatch({
          type: "RENDER_FAILED",
          message: err instanceof Error ? err.message : String(err),
        });
      });
  }, [phase, text, config, sink, store, dispatch]);

  // ------------------------------------------------------------------
  // Exit once the last screen has been drawn
  // ------------------------------------------------------------------

  useEffect(() => {
    if (TERMINAL_PHASES.has(phase)) exit();
  }, [phase, exit]);

  const mutedFn = themeText("muted");
  const primaryFn = themeText("primary");

  return (
    <Box flexDirection="column">
      <Text>{bannerColor()(`anomaly-spiral · ${sourceLabel}`)}</Text>

      {phase === "prompt" && (
        <AnomalyPrompt
          value={anomalyInput}
          onChange={onChange}
          onSubmit={onSubmit}
          fallbackPct={config.fallbackAnomalyPct}
        />
      )}

      {anomalyPct !== null && phase !== "prompt" && (
        <Text>{primaryFn(`Anomaly at: ${anomalyPct}%`)}</Text>
      )}

      {(phase === "rendering" || phase === "done") && <RenderProgress progress={progress} />}

      {phase === "done" && lastFrame && <FramePreview frame={lastFrame} config={config} />}

      {phase === "done" && summary && (
        <Text>
          {statusColor("ready")("✔")}{" "}
          {primaryFn(`Saved spiral animation as ${summary.destination}`)}{" "}
          {mutedFn(`(${summary.frameCount} frames, ${summary.numChars} characters)`)}
        </Text>
      )}

      {phase === "empty" && <Text>{statusColor("warning")("No text entered.")}</Text>}

      {phase === "error" && error && <Text>{statusColor("error")(`Render failed: ${error}`)}</Text>}
    </Box>
  );
}
