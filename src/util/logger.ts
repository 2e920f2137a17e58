import pino from "pino";

const BASE = { service: "research-scheduler" };

let root: pino.Logger = pino({ level: "info", base: BASE });
const children = new Map<string, pino.Logger>();

export type Logger = Pick<pino.Logger, "info" | "warn" | "error" | "debug">;

/**
 * Rebuild the root logger once the configured level is known. Loggers handed
 * out by getLogger before this call follow the new root.
 */
export function initLogger(level: string, destination?: pino.DestinationStream): void {
  const options: pino.LoggerOptions = {
    level,
    base: BASE,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  if (destination) {
    root = pino(options, destination);
  } else {
    root = pino({
      ...options,
      transport: process.stdout.isTTY
        ? { target: "pino/file", options: { destination: 1 } }
        : undefined,
    });
  }
  children.clear();
}

function resolve(name?: string): pino.Logger {
  if (!name) return root;
  let child = children.get(name);
  if (!child) {
    child = root.child({ component: name });
    children.set(name, child);
  }
  return child;
}

/** Component logger. Resolves against the current root on every call. */
export function getLogger(name?: string): Logger {
  return {
    get info() {
      const target = resolve(name);
      return target.info.bind(target);
    },
    get warn() {
      const target = resolve(name);
      return target.warn.bind(target);
    },
    get error() {
      const target = resolve(name);
      return target.error.bind(target);
    },
    get debug() {
      const target = resolve(name);
      return target.debug.bind(target);
    },
  };
}
