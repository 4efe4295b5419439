export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export { LoadedConfig } from "./core/config"
export { ConfigValidationError, type LoadConfigOptions, loadConfig } from "./core/load"
export type { Config } from "./ports/config"
export type { ConfigSource } from "./ports/source"
