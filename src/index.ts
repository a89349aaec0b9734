export * from "./features/remote-shell/index.js";
export { createLogger, type Logger, type LogLevel } from "./shared/logger.js";
