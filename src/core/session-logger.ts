import { log } from "@clack/prompts";

export interface SessionLogger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
}

export const clackSessionLogger: SessionLogger = {
  info(message) {
    log.info(message);
  },
  success(message) {
    log.success(message);
  },
  warn(message) {
    log.warn(message);
  }
};

export const silentSessionLogger: SessionLogger = {
  info: () => undefined,
  success: () => undefined,
  warn: () => undefined
};
