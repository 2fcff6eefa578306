import fs from "node:fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string | Error): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  /** Every line is also appended to this file (bypass mode). */
  mirrorFile?: string;
  /** Replaces the console, mostly for tests. */
  write?: (level: LogLevel, line: string) => void;
  verbose?: boolean;
}

function consoleWrite(level: LogLevel, line: string): void {
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "debug":
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

export function formatLine(level: LogLevel, scope: string, message: string, now = new Date()): string {
  return `[${level.toUpperCase()}] ${now.toISOString()} [${scope}] ${message}`;
}

interface MirrorState {
  broken: boolean;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  return buildLogger(scope, options, { broken: false });
}

// children share the mirror state so a broken mirror is reported once
function buildLogger(scope: string, options: LoggerOptions, mirror: MirrorState): Logger {
  const write = options.write ?? consoleWrite;
  const verbose = options.verbose ?? process.env.NODE_ENV !== "production";

  const emit = (level: LogLevel, message: string) => {
    if (level === "debug" && !verbose) return;
    const line = formatLine(level, scope, message);
    write(level, line);

    if (!options.mirrorFile || mirror.broken) return;
    try {
      fs.appendFileSync(options.mirrorFile, `${line}\n`, "utf-8");
    } catch (err) {
      mirror.broken = true;
      const reason = err instanceof Error ? err.message : String(err);
      write("warn", formatLine("warn", scope, `Mirror log ${options.mirrorFile} disabled: ${reason}`));
    }
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message instanceof Error ? message.stack || message.message : message),
    child: (childScope) => buildLogger(`${scope}:${childScope}`, options, mirror)
  };
}
