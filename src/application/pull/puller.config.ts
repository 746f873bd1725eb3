export type PullerConfig = {
  maxHttpConnections: number;
  entriesPerBatch: number;
  includeIncomplete: boolean;
  resumeLastPull: boolean;
  startFromDate?: string;
  formId?: string;
};

export type PullerConfigInput = Partial<PullerConfig>;

export const defaultPullerConfig: PullerConfig = {
  maxHttpConnections: 8,
  entriesPerBatch: 100,
  includeIncomplete: false,
  resumeLastPull: false
};

export const pullerCaps = {
  maxHttpConnections: { min: 1, max: 32 },
  entriesPerBatch: { min: 1, max: 1000 }
} as const;

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validatePullerConfig = (config: PullerConfig): PullerConfig => {
  assertIntegerInRange(
    "maxHttpConnections",
    config.maxHttpConnections,
    pullerCaps.maxHttpConnections.min,
    pullerCaps.maxHttpConnections.max
  );
  assertIntegerInRange("entriesPerBatch", config.entriesPerBatch, pullerCaps.entriesPerBatch.min, pullerCaps.entriesPerBatch.max);
  if (config.startFromDate !== undefined && !DATE_ONLY.test(config.startFromDate)) {
    throw new Error(`startFromDate=${config.startFromDate} must be a YYYY-MM-DD date`);
  }
  return config;
};

const normalizeOptionalString = (value: string | undefined): string | undefined => {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim();
  return normalized === "" ? undefined : normalized;
};

export const resolvePullerConfig = (input: PullerConfigInput = {}): PullerConfig =>
  validatePullerConfig({
    ...defaultPullerConfig,
    ...input,
    startFromDate: normalizeOptionalString(input.startFromDate),
    formId: normalizeOptionalString(input.formId)
  });
