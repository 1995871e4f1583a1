import { readFile } from "node:fs/promises";
import YAML from "yaml";
import { z } from "zod";
import { LOG_THRESHOLDS } from "../log/logger.js";
import { DEFAULT_FAULT_POLICY, FAULT_ACTIONS } from "../host/fault-policy.js";

export const hostConfigSchema = z.object({
  target: z.string().min(1),
  /** Plugin modules to load, by name. */
  modules: z.array(z.string().min(1)).default([]),
  features: z.record(z.string(), z.boolean()).default({}),
  faults: z
    .object({
      action: z.enum(FAULT_ACTIONS).default(DEFAULT_FAULT_POLICY.action),
      maxFaults: z
        .number()
        .int()
        .positive()
        .default(DEFAULT_FAULT_POLICY.maxFaults),
    })
    .default({}),
  frameIntervalMs: z.number().positive().default(16),
  tickIntervalMs: z.number().positive().default(50),
  logLevel: z.enum(LOG_THRESHOLDS).default("info"),
});

export type HostConfig = z.infer<typeof hostConfigSchema>;

export interface ConfigIssue {
  /** Dotted path of the offending key, empty for the document itself. */
  path: string;
  message: string;
}

export class ConfigError extends Error {
  readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[], source?: string) {
    const where = source ? ` in ${source}` : "";
    super(
      `Invalid host configuration${where}: ${issues
        .map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))
        .join("; ")}`,
    );
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Parse and validate a YAML host configuration, filling in defaults.
 */
export function parseHostConfig(text: string, source?: string): HostConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new ConfigError([{ path: "", message }], source);
  }

  const parsed = hostConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
      source,
    );
  }
  return parsed.data;
}

export async function loadHostConfig(path: string): Promise<HostConfig> {
  const text = await readFile(path, "utf-8");
  return parseHostConfig(text, path);
}
