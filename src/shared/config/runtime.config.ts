import {
  defaultPullerConfig,
  type PullerConfig,
  pullerCaps,
  validatePullerConfig
} from "../../application/pull/puller.config";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 120000 }
} as const;

export type RuntimeConfig = {
  pullerConfig: PullerConfig;
  timeoutMs: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalBoolean = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = env[name]?.trim().toLowerCase();
  if (raw == null || raw === "") return undefined;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new Error(`${name}=${env[name] ?? ""} must be true or false`);
};

const parseOptionalString = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const pullerConfig = validatePullerConfig({
    ...defaultPullerConfig,
    maxHttpConnections:
      parseOptionalIntInRange(env, "PULL_MAX_HTTP_CONNECTIONS", pullerCaps.maxHttpConnections) ??
      defaultPullerConfig.maxHttpConnections,
    entriesPerBatch:
      parseOptionalIntInRange(env, "PULL_ENTRIES_PER_BATCH", pullerCaps.entriesPerBatch) ??
      defaultPullerConfig.entriesPerBatch,
    includeIncomplete: parseOptionalBoolean(env, "PULL_INCLUDE_INCOMPLETE") ?? defaultPullerConfig.includeIncomplete,
    resumeLastPull: parseOptionalBoolean(env, "PULL_RESUME_LAST") ?? defaultPullerConfig.resumeLastPull,
    startFromDate: parseOptionalString(env, "PULL_START_FROM_DATE"),
    formId: parseOptionalString(env, "PULL_FORM_ID")
  });

  const timeoutMs =
    parseOptionalIntInRange(env, "HTTP_TIMEOUT_MS", {
      min: runtimeCaps.timeoutMs.min,
      max: runtimeCaps.timeoutMs.max
    }) ?? 30000;

  return { pullerConfig, timeoutMs };
};
