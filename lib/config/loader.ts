import { CONFIG_DEFINITIONS, ConfigSchema, type ConfigValueMap } from "./registry";

type RawValues = Record<string, string | undefined>;

const ENV_VAR_BY_KEY = new Map<string, string>(
  Object.entries(CONFIG_DEFINITIONS).map(([key, definition]) => [key, definition.envVar]),
);

const config: ConfigValueMap = loadConfig();

/**
 * Parse configuration from environment variables.
 * Invalid values are logged and replaced by their defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConfigValueMap {
  const raw = readRawValues(env);
  const result = ConfigSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  for (const issue of result.error.issues) {
    const key = issue.path[0];
    if (typeof key !== "string") {
      continue;
    }
    console.warn(
      `[Config] Invalid value for ${ENV_VAR_BY_KEY.get(key) ?? key}: ${issue.message}. Falling back to default.`,
    );
    raw[key] = undefined;
  }

  return ConfigSchema.parse(raw);
}

export function getConfigSync(): ConfigValueMap {
  return config;
}

function readRawValues(env: NodeJS.ProcessEnv): RawValues {
  const raw: RawValues = {};
  for (const [key, envVar] of ENV_VAR_BY_KEY) {
    const value = env[envVar]?.trim();
    raw[key] = value === "" ? undefined : value;
  }
  return raw;
}
