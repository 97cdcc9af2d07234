export const SWITCHBOARD_CONFIG = Symbol.for("switchboard:config");
export const CLI_RUNTIME_OPTIONS = Symbol.for("switchboard:cli-runtime-options");
