export * from "./keyed-mutex";
export * from "./deadline";
