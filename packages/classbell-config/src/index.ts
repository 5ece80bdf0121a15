export { ConfigFile, defaultConfigPath, loadConfig, parseConfig } from "./config.ts"
export { ConfigError, UnknownCommandError, UnknownEventError } from "./errors.ts"
export { commandForEvent, commandNamed, formatCommand } from "./lookup.ts"
export type { CommandSpec, Config } from "./types.ts"
