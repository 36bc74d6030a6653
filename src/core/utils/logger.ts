import pino from "pino";

// Set log level via env LOG_LEVEL (default: info)
const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport:
    process.env.NODE_ENV === "production" || process.env.NODE_ENV === "test"
      ? undefined
      : {
          target: "pino-pretty",
          options: { colorize: true },
        },
});

export interface LogMeta {
  site?: string;
  url?: string;
  duration?: number;
  count?: number;
  error?: string;
  [key: string]: unknown;
}

export class Logger {
  static info(message: string, meta?: LogMeta): void {
    logger.info(meta || {}, message);
  }
  static warn(message: string, meta?: LogMeta): void {
    logger.warn(meta || {}, message);
  }
  static error(message: string, error?: unknown, meta?: LogMeta): void {
    const errorMeta = {
      ...meta,
      error: error instanceof Error ? error.message : error == null ? undefined : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    };
    logger.error(errorMeta, message);
  }
  static debug(message: string, meta?: LogMeta): void {
    logger.debug(meta || {}, message);
  }
  // Convenience methods for common logging patterns
  static collectComplete(site: string, urlCount: number, duration: number): void {
    this.info(`Link collection complete`, { site, urlCount, duration });
  }
  static batchProgress(site: string, processed: number, total: number, rate: number): void {
    this.info(`Progress: ${processed}/${total}`, { site, processed, total, rate: rate.toFixed(1) });
  }
  static itemFailed(site: string, url: string, error: unknown): void {
    this.warn(`Item failed: ${url}`, {
      site,
      url,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  static cooldownActivated(site: string, consecutiveErrors: number): void {
    this.warn(
      `Cooldown activated due to ${consecutiveErrors} consecutive errors`,
      { site, consecutiveErrors },
    );
  }
}
