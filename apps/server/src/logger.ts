import log from "electron-log/node";
import type { ServerConfig } from "./config";

export type ScopedLogger = ReturnType<typeof log.scope>;

/** Console always; file only when LOG_FILE is set. */
export function configureLogging(config: Pick<ServerConfig, "logLevel" | "logFile">): void {
  log.transports.console.level = config.logLevel;

  const logFile = config.logFile;
  if (logFile) {
    log.transports.file.resolvePathFn = () => logFile;
    log.transports.file.level = config.logLevel;
  } else {
    log.transports.file.level = false;
  }
}

export const serverLog = log.scope("server");
export const loaderLog = log.scope("loader");
export const httpLog = log.scope("http");

export default log;
