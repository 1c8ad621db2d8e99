export interface LoggerOptions {
  level?: string;
  log?: (message: string) => void;
  error?: (message: string, cause?: unknown) => void;
}

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, cause?: unknown) => void;
}

type Fields = Record<string, string | number | boolean | null | undefined>;

/** `sync started (recordId=1, source=acme/widget)` */
export function formatLine(message: string, fields: Fields = {}): string {
  const parts = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${value ?? "null"}`);

  if (parts.length === 0) {
    return message;
  }

  return `${message} (${parts.join(", ")})`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const log = options.log ?? console.log;
  const error =
    options.error ??
    ((message: string, cause?: unknown) => {
      if (cause === undefined) {
        console.error(message);
      } else {
        console.error(message, cause);
      }
    });
  const debugEnabled = options.level === "debug";

  return {
    debug(message: string): void {
      if (debugEnabled) {
        log(message);
      }
    },
    info(message: string): void {
      log(message);
    },
    warn(message: string): void {
      log(`warning: ${message}`);
    },
    error(message: string, cause?: unknown): void {
      error(message, cause);
    }
  };
}
