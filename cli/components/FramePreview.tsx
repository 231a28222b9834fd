/**
 * Braille preview of a composed frame.
 *
 * Rasterizes the frame's draw list onto a 2x4 sub-pixel grid per terminal
 * cell and prints the resulting braille rows.
 */

import React, { useMemo } from "react";
import { Box, Text } from "ink";

import { renderBraille } from "../../lib/render/braille.js";
import { rasterizeFrame } from "../../lib/render/raster.js";
import { rgbaToHex } from "../../lib/spiral/color.js";
import type { SpiralConfig } from "../../lib/spiral/config.js";
import type { Frame } from "../../lib/spiral/types.js";
import { previewPalette } from "../../lib/theme/ink-colors.js";

export interface FramePreviewProps {
  frame: Frame;
  config: SpiralConfig;
  /** Terminal columns used by the preview; rows are half as many. */
  cols?: number;
}

export function FramePreview({ frame, config, cols = 40 }: FramePreviewProps) {
  const lines = useMemo(() => {
    const target = { cols, rows: Math.max(1, Math.round(cols / 2)) };
    const grid = rasterizeFrame(frame, config.canvasSize, config.anomalyColor, target);
    return renderBraille(grid, target, previewPalette(rgbaToHex(config.anomalyColor)));
  }, [frame, config, cols]);

  return (
    <Box flexDirection="column">
      {lines.map((line, i) => (
        <Text key={i}>{line}</Text>
      ))}
    </Box>
  );
}
