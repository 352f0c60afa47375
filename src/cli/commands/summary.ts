import { Command, Option } from "clipanion";
import { resolve } from "node:path";
import { loadConfig } from "../../config/loader.js";
import { createLogger } from "../../logging/logger.js";
import { MetricsEngine } from "../../engine/compute.js";
import { loadEvents } from "../../ingest/event-file.js";
import type { EmojiCount, MetricBundle, RankedEntry } from "../../engine/types.js";

function formatMinutes(seconds: number | undefined): string {
  if (seconds === undefined) return "n/a";
  return `${Math.round(seconds / 60)} min`;
}

function formatRanking(entries: readonly RankedEntry[]): string {
  if (entries.length === 0) return "(none)";
  return entries.map((e) => `${e.rank}. ${e.contactKey} (${e.value})`).join(", ");
}

function formatEmojis(emojis: readonly EmojiCount[]): string {
  if (emojis.length === 0) return "(none)";
  return emojis.map((e) => `${e.emoji} (${e.count})`).join(" ");
}

export function renderSummary(bundle: MetricBundle): string {
  const { totals, activity, personality, rankings } = bundle;
  const lines = [
    `Texting Wrapped`,
    `---------------`,
    `Messages:     ${totals.messages} (${totals.sent} sent, ${totals.received} received)`,
    `Words sent:   ${totals.wordsSent}`,
    `Top emoji:    ${formatEmojis(activity.topEmojis)}`,
    `Contacts:     ${totals.contacts}`,
    `Personality:  ${personality.label} - ${personality.tagline}`,
    `Reply time:   ${formatMinutes(bundle.latency.global.you?.medianSeconds)} (median)`,
    `Peak hour:    ${activity.peakHour ?? "n/a"}`,
    `Busiest day:  ${activity.busiestDay ? `${activity.busiestDay.date} (${activity.busiestDay.count})` : "n/a"}`,
    `Top contacts: ${formatRanking(rankings.topContacts)}`,
    `Heating up:   ${formatRanking(rankings.heatingUp)}`,
    `Ghosted:      ${formatRanking(rankings.ghosted)}`,
  ];
  return lines.join("\n") + "\n";
}

export class SummaryCommand extends Command {
  static override paths = [["summary"]];

  static override usage = Command.Usage({
    description: "Print a short plain-text summary of the metrics",
    examples: [["Summarize an event file", "wrapped summary ./events.ndjson"]],
  });

  eventsFile = Option.String({ name: "events" });

  configPath = Option.String("-c,--config", {
    description: "Path to wrapped.config.json",
  });

  async execute(): Promise<number> {
    let bundle: MetricBundle;
    try {
      const config = loadConfig(this.configPath);
      const events = loadEvents(resolve(this.eventsFile));
      bundle = new MetricsEngine(config.engine, createLogger(config.logging)).compute(events);
    } catch (err) {
      this.context.stderr.write(`Failed: ${err instanceof Error ? err.message : String(err)}\n`);
      return 1;
    }

    this.context.stdout.write(renderSummary(bundle));
    return 0;
  }
}
