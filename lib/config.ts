import { CONFIG_DEFINITIONS, ConfigSchema, type ConfigDefinition, type ConfigKey, type ConfigValueMap } from "./config/registry";
import { getConfigSync } from "./config/loader";

export { CONFIG_DEFINITIONS, ConfigSchema };
export type { ConfigDefinition, ConfigKey, ConfigValueMap };
export type { TriageEnvironment } from "./config/registry";
export { getConfigSync, loadConfig } from "./config/loader";
export { getCheckpointPolicy, getRetryPolicy, getTriageSettings } from "./config/helpers";
export type { CheckpointPolicy, TriageSettings } from "./config/helpers";

export const config = getConfigSync();
