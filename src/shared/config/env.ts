export type Env = {
  MONGO_URI: string;
  AGGREGATE_URL: string;
  AGGREGATE_USERNAME?: string;
  AGGREGATE_PASSWORD?: string;
  STORAGE_DIR: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }
  if (parsed.username !== "" || parsed.password !== "") {
    throw new Error(`${name} must not embed credentials, use AGGREGATE_USERNAME and AGGREGATE_PASSWORD`);
  }

  return value;
};

const optional = (value: string | undefined): string | undefined =>
  value != null && value.trim() !== "" ? value : undefined;

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = env.MONGO_URI ?? "mongodb://localhost:27017/formpull";
  const AGGREGATE_URL = validateHttpUrl("AGGREGATE_URL", env.AGGREGATE_URL ?? "http://localhost:8080");
  const STORAGE_DIR = optional(env.STORAGE_DIR) ?? "./storage";
  const AGGREGATE_USERNAME = optional(env.AGGREGATE_USERNAME);
  const AGGREGATE_PASSWORD = optional(env.AGGREGATE_PASSWORD);

  if ((AGGREGATE_USERNAME === undefined) !== (AGGREGATE_PASSWORD === undefined)) {
    throw new Error("AGGREGATE_USERNAME and AGGREGATE_PASSWORD must be set together");
  }

  return { MONGO_URI, AGGREGATE_URL, AGGREGATE_USERNAME, AGGREGATE_PASSWORD, STORAGE_DIR };
};
