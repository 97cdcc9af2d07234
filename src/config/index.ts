export * from "./types";
export * from "./defaults";
export * from "./config.schema";
export * from "./config.tokens";
export * from "./loader";
export * from "./config.module";
