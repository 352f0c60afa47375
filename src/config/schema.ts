import { z } from "zod";
import type { EngineConfig, WrappedConfig } from "./types.js";

const clockTimeSchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM (24h)");

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const nightWindowSchema = z
  .object({
    start: clockTimeSchema.default("00:00"),
    end: clockTimeSchema.default("05:00"),
  })
  .refine((w) => w.start !== w.end, { message: "night window start and end must differ" });

const sessionSchema = z.object({
  idleGapMs: z.number().positive().default(14_400_000),
});

const latencySchema = z.object({
  maxDelayMs: z.number().positive().default(86_400_000),
});

const trendSchema = z.object({
  windowFraction: z.number().positive().max(0.5).default(1 / 3),
  growthThreshold: z.number().min(1).default(1.5),
  declineThreshold: z.number().min(0).max(1).default(0.3),
  minVolume: z.number().int().min(1).default(10),
});

const rankingSchema = z.object({
  topN: z.number().int().positive().default(5),
  fanRatio: z.number().min(1).default(2),
  fanMinMessages: z.number().int().min(0).default(50),
  initiatorMinSessions: z.number().int().min(1).default(3),
});

const personalitySchema = z.object({
  nightOwlMinLateNightFraction: z.number().min(0).max(1).default(0.2),
  nightOwlPeakHourStart: z.number().int().min(0).max(23).default(23),
  nightOwlPeakHourEnd: z.number().int().min(0).max(23).default(5),
  alwaysOnlineMaxReplySeconds: z.number().positive().default(300),
  alwaysOnlineMinMessages: z.number().int().min(0).default(5_000),
  leavesOnReadMinReplySeconds: z.number().positive().default(7_200),
  inDemandMaxSendRatio: z.number().positive().default(0.5),
  yapperMinSendRatio: z.number().positive().default(2),
  starterMinInitiationRatio: z.number().min(0).max(1).default(0.65),
  chillMaxInitiationRatio: z.number().min(0).max(1).default(0.35),
});

export const engineConfigSchema = z.object({
  nightWindow: nightWindowSchema.default({}),
  session: sessionSchema.default({}),
  latency: latencySchema.default({}),
  trend: trendSchema.default({}),
  ranking: rankingSchema.default({}),
  personality: personalitySchema.default({}),
});

export const wrappedConfigSchema = z.object({
  logging: loggingSchema.default({}),
  engine: engineConfigSchema.default({}),
});

export function parseConfig(raw: unknown): WrappedConfig {
  return wrappedConfigSchema.parse(raw);
}

export function parseEngineConfig(raw: unknown): EngineConfig {
  return engineConfigSchema.parse(raw);
}
