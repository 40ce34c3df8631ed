export { buildRelayConfig, readRelayConfig } from "./config";
export { mergedConfigSchema, userConfigSchema } from "./config.schema";
export type { MergedConfigInput, UserConfigInput } from "./config.schema";
export type { ConfigSource, ReadConfigOptions, RelayConfig, RelayPaths } from "./config.types";
export { fromEnv, loadEnvFiles } from "./env";
export { toFriendlyZodError } from "./validation";
export { packageRoot } from "./paths";
