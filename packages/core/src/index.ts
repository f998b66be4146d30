export * from "./encoding";
export { isLogLevel, type LogEntry, Logger, type LogLevel, silentLogger } from "./logger";
export * from "./protocol";
export * from "./result";
export * from "./schema";
export * from "./validation";
