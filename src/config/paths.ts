import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

export function getConfigPath(): string {
  return process.env["WRAPPED_CONFIG_PATH"] ?? "wrapped.config.json";
}

export function ensureParentDir(filePath: string): string {
  mkdirSync(dirname(filePath), { recursive: true });
  return filePath;
}
