/**
 * Frame progress line: a bar plus the reveal count of the latest frame.
 */

import React from "react";
import { Text } from "ink";

import type { RenderProgress as Progress } from "../../lib/store/types.js";
import { statusColor, themeText } from "../../lib/theme/ink-colors.js";
import { progressBar } from "../lib/progress.js";

export function RenderProgress({ progress }: { progress: Progress }) {
  const { framesComposed, totalFrames, visibleCount, numChars } = progress;
  const activeFn = statusColor("active");
  const mutedFn = themeText("muted");

  return (
    <Text>
      {activeFn(progressBar(framesComposed, totalFrames))}{" "}
      {mutedFn(
        `Frame ${framesComposed}/${totalFrames} — chars shown: ${visibleCount}/${numChars}`,
      )}
    </Text>
  );
}
