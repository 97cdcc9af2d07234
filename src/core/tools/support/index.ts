export * from "./support-data.source";
export * from "./support-schema.migration";
export * from "./knex-support-data.source";
export * from "./support-tools";
