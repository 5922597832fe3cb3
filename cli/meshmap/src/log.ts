export type Logger = {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
  debug(message: string): void;
};

let debugEnabled = false;
let quiet = false;

export function setDebug(enabled: boolean) {
  debugEnabled = enabled;
}

/** Silences all output; used by tests. */
export function setQuiet(value: boolean) {
  quiet = value;
}

function stamp() {
  const d = new Date();
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export function createLogger(module: string): Logger {
  const prefix = () => `[${stamp()}] [${module}]`;
  return {
    info(message) {
      if (quiet) return;
      console.log(`${prefix()} ${message}`);
    },
    warn(message) {
      if (quiet) return;
      console.warn(`${prefix()} warn: ${message}`);
    },
    error(message, err) {
      if (quiet) return;
      console.error(`${prefix()} error: ${message}`);
      if (err instanceof Error && err.stack && debugEnabled) console.error(err.stack);
    },
    debug(message) {
      if (quiet || !debugEnabled) return;
      console.log(`${prefix()} debug: ${message}`);
    },
  };
}
