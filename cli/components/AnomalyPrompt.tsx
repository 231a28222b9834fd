/**
 * Single-line numeric prompt for the anomaly percentage.
 *
 * Enter submits. Supports backspace and a blinking block cursor; shows the
 * fallback value as placeholder text while empty.
 */

import React, { useEffect, useState } from "react";
import { Box, Text, useInput } from "ink";

import { themeText } from "../../lib/theme/ink-colors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AnomalyPromptProps {
  value: string;
  onChange: (value: string) => void;
  onSubmit: () => void;
  fallbackPct: number;
  isFocused?: boolean;
}

// ---------------------------------------------------------------------------
// Component
// ---------------------------------------------------------------------------

export function AnomalyPrompt({
  value,
  onChange,
  onSubmit,
  fallbackPct,
  isFocused = true,
}: AnomalyPromptProps) {
  const [cursorVisible, setCursorVisible] = useState(true);

  useEffect(() => {
    if (!isFocused) {
      setCursorVisible(false);
      return;
    }
    setCursorVisible(true);
    const interval = setInterval(() => {
      setCursorVisible((prev) => !prev);
    }, 530);
    return () => clearInterval(interval);
  }, [isFocused]);

  useInput(
    (input, key) => {
      if (key.return) {
        onSubmit();
        return;
      }

      if (key.backspace || key.delete) {
        if (value.length > 0) {
          onChange(value.slice(0, -1));
        }
        return;
      }

      // Regular character input (skip control sequences)
      if (input && input.length === 1 && input.charCodeAt(0) >= 32) {
        onChange(value + input);
      }
    },
    { isActive: isFocused },
  );

  const mutedFn = themeText("muted");
  const primaryFn = themeText("primary");

  const isEmpty = value.length === 0;
  const cursor = isFocused && cursorVisible ? "█" : " "; // █ block cursor

  return (
    <Box flexDirection="column">
      <Box>
        <Text>
          <Text>{primaryFn("Anomaly percentage (0–100): ")}</Text>
          {isEmpty ? <Text>{mutedFn(String(fallbackPct))}</Text> : <Text>{primaryFn(value)}</Text>}
          {isFocused && <Text>{cursor}</Text>}
        </Text>
      </Box>
      <Text>{mutedFn("Enter to render · unparseable input uses the default")}</Text>
    </Box>
  );
}
