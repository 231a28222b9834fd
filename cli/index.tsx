#!/usr/bin/env node
/**
 * Entry point for the anomaly-spiral command.
 *
 * Reads the text file and configuration, then hands over to the Ink App for
 * the anomaly prompt, the render and the preview. Exit code 0 on success or
 * empty input, 1 on failure, 2 on usage errors.
 */

import React from "react";
import { render } from "ink";

import { loadSpiralConfig } from "../lib/config/load.js";
import { createFrameSink } from "../lib/encode/index.js";
import { fileTextSource } from "../lib/io/text-source.js";
import { parseAnomalyPercent } from "../lib/spiral/anomaly.js";
import { createCliStore } from "../lib/store/index.js";
import { normalizeText } from "../lib/utils/text.js";
import { App } from "./app.js";
import { parseCliArgs, USAGE } from "./lib/args.js";

async function main(): Promise<number> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (parsed.kind === "help") {
    console.log(USAGE);
    return 0;
  }
  if (parsed.kind === "error") {
    console.error(`${parsed.message}\n\n${USAGE}`);
    return 2;
  }

  const { options } = parsed;
  const config = loadSpiralConfig(options.configPath);
  const sink = createFrameSink(options.outputPath, config);

  const source = fileTextSource(options.textPath);
  const text = await source.read();
  if (normalizeText(text) === "") {
    console.log("No text loaded from file. Exiting.");
    return 0;
  }

  const anomalyPct =
    options.anomalyRaw === null
      ? null
      : parseAnomalyPercent(options.anomalyRaw, config.fallbackAnomalyPct);
  const store = createCliStore({ anomalyPct, fallbackPct: config.fallbackAnomalyPct });

  const { waitUntilExit } = render(
    <App text={text} sourceLabel={source.label} config={config} sink={sink} store={store} />,
    { patchConsole: false },
  );
  await waitUntilExit();

  return store.getState().phase === "error" ? 1 : 0;
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((err: unknown) => {
    console.error(`[cli] ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
