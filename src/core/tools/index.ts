export * from "./registry";
export * from "./tool-catalog";
export * from "./toolset-composer.service";
export * from "./truncate";
export * from "./workspace-path";
export * from "./builtin";
export * from "./support";
export * from "./tools.module";
