export * from "./conversation-message";
export * from "./conversation-replay";
export * from "./session.types";
export * from "./session-manager.service";
export * from "./sessions.module";
