import { Command, Option } from "clipanion";
import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { loadConfig } from "../../config/loader.js";
import { ensureParentDir } from "../../config/paths.js";
import { createLogger } from "../../logging/logger.js";
import { MetricsEngine } from "../../engine/compute.js";
import { EngineError } from "../../engine/errors.js";
import { loadEvents } from "../../ingest/event-file.js";
import type { WrappedConfig } from "../../config/types.js";
import type { MessageEvent, MetricBundle } from "../../engine/types.js";

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ComputeCommand extends Command {
  static override paths = [["compute"]];

  static override usage = Command.Usage({
    description: "Compute wrapped metrics from an event file",
    details: `
      Reads a JSON array or NDJSON file of message events and writes the
      metric bundle as JSON to stdout, or to a file with \`--out\`.
    `,
    examples: [
      ["Print metrics", "wrapped compute ./events.ndjson"],
      ["Write metrics to a file", "wrapped compute ./events.json --out ./out/metrics.json"],
      ["Use a specific config", "wrapped compute ./events.json --config ./wrapped.config.json"],
    ],
  });

  eventsFile = Option.String({ name: "events" });

  configPath = Option.String("-c,--config", {
    description: "Path to wrapped.config.json",
  });

  outFile = Option.String("-o,--out", {
    description: "Write the bundle to this file instead of stdout",
  });

  compact = Option.Boolean("--compact", false, {
    description: "Emit single-line JSON",
  });

  async execute(): Promise<number> {
    let config: WrappedConfig;
    try {
      config = loadConfig(this.configPath);
    } catch (err) {
      this.context.stderr.write(`Failed to load config: ${describeError(err)}\n`);
      return 1;
    }

    const logger = createLogger(config.logging);
    const eventsPath = resolve(this.eventsFile);

    let events: MessageEvent[];
    try {
      events = loadEvents(eventsPath);
    } catch (err) {
      this.context.stderr.write(`Failed to read events from ${eventsPath}: ${describeError(err)}\n`);
      return 1;
    }

    let bundle: MetricBundle;
    try {
      bundle = new MetricsEngine(config.engine, logger).compute(events);
    } catch (err) {
      if (!(err instanceof EngineError)) throw err;
      logger.error({ code: err.code, contactKey: err.contactKey, metric: err.metric }, "Metric computation failed");
      this.context.stderr.write(`Metric computation failed [${err.code}]: ${err.message}\n`);
      return 1;
    }

    const json = JSON.stringify(bundle, null, this.compact ? undefined : 2) + "\n";

    if (this.outFile) {
      const outPath = ensureParentDir(resolve(this.outFile));
      writeFileSync(outPath, json, "utf-8");
      this.context.stdout.write(
        `Wrote metrics for ${bundle.totals.contacts} contacts (${bundle.totals.messages} messages) to ${outPath}\n`,
      );
    } else {
      this.context.stdout.write(json);
    }

    return 0;
  }
}
