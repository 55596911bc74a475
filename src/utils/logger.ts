/**
 * Structured logging for the relay
 *
 * Pino-compatible level numbers, one child logger per component, pretty lines
 * while developing and JSON lines in production (or with LOG_PRETTY=false).
 *
 * Usage:
 *   import { serviceLoggers } from '../utils/logger';
 *   serviceLoggers.poller.info('Cycle complete', { delivered: 2 });
 */

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Numeric log level values (pino-compatible) */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/** Fields attached to an entry; `service` names the component */
export type LogContext = Record<string, unknown> & { service?: string };

export interface LoggerConfig {
  level: LogLevel;
  name?: string;
  prettyPrint: boolean;
  /** Bound context merged into every entry */
  bindings?: LogContext;
}

export interface Logger {
  level: LogLevel;
  trace(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * LOG_LEVEL, else debug outside production and info in production
 */
function getLogLevelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

function shouldPrettyPrint(): boolean {
  if (process.env.LOG_PRETTY === "false") {
    return false;
  }
  return process.env.NODE_ENV !== "production";
}

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";
const CYAN = "\x1b[36m";

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m",
  debug: CYAN,
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[31m\x1b[1m",
};

const CONSOLE_METHODS: Record<LogLevel, "debug" | "info" | "warn" | "error"> = {
  trace: "debug",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
  fatal: "error",
};

function formatPretty(time: string, level: LogLevel, service: string | undefined, msg: string, context: LogContext): string {
  const clock = DIM + (time.split("T")[1]?.replace("Z", "") ?? time) + RESET;
  const label = LEVEL_COLORS[level] + level.toUpperCase().padEnd(5) + RESET;
  const name = service ? `${CYAN}[${service}]${RESET} ` : "";
  const extra = Object.keys(context).length > 0 ? ` ${DIM}${JSON.stringify(context)}${RESET}` : "";
  return `${clock} ${label} ${name}${msg}${extra}`;
}

/**
 * Create a structured logger instance
 */
function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  const level = config.level ?? getLogLevelFromEnv();
  const prettyPrint = config.prettyPrint ?? shouldPrettyPrint();
  const bindings = config.bindings ?? {};
  const threshold = LOG_LEVELS[level];

  function output(entryLevel: LogLevel, msg: string, context: LogContext = {}): void {
    if (LOG_LEVELS[entryLevel] < threshold) {
      return;
    }

    const time = new Date().toISOString();
    const { service: _ignored, ...fields } = { ...bindings, ...context };
    const line = prettyPrint
      ? formatPretty(time, entryLevel, config.name, msg, fields)
      : JSON.stringify({
          time,
          level: entryLevel,
          levelNum: LOG_LEVELS[entryLevel],
          msg,
          ...fields,
          ...(config.name ? { service: config.name } : {}),
        });

    // eslint-disable-next-line no-console
    console[CONSOLE_METHODS[entryLevel]](line);
  }

  return {
    level,
    trace: (msg, context) => output("trace", msg, context),
    debug: (msg, context) => output("debug", msg, context),
    info: (msg, context) => output("info", msg, context),
    warn: (msg, context) => output("warn", msg, context),
    error: (msg, context) => output("error", msg, context),
    fatal: (msg, context) => output("fatal", msg, context),
    child: (childBindings) =>
      createLogger({
        level,
        prettyPrint,
        name: childBindings.service ?? config.name,
        bindings: { ...bindings, ...childBindings },
      }),
  };
}

export const logger = createLogger({
  name: "whale-alert-relay",
});

export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service: serviceName });
}

const SERVICE_NAMES = {
  poller: "Poller",
  sources: "Sources",
  fanOut: "FanOut",
  telegram: "Telegram",
  sheets: "Sheets",
  webhook: "Webhook",
  api: "CoinGlass",
  prices: "MarketPrice",
  startup: "Startup",
} as const;

type ServiceKey = keyof typeof SERVICE_NAMES;

const serviceLoggerCache = new Map<ServiceKey, Logger>();

function getServiceLogger(key: ServiceKey): Logger {
  let log = serviceLoggerCache.get(key);
  if (!log) {
    log = createServiceLogger(SERVICE_NAMES[key]);
    serviceLoggerCache.set(key, log);
  }
  return log;
}

export const serviceLoggers = {
  get poller(): Logger {
    return getServiceLogger("poller");
  },
  get sources(): Logger {
    return getServiceLogger("sources");
  },
  get fanOut(): Logger {
    return getServiceLogger("fanOut");
  },
  get telegram(): Logger {
    return getServiceLogger("telegram");
  },
  get sheets(): Logger {
    return getServiceLogger("sheets");
  },
  get webhook(): Logger {
    return getServiceLogger("webhook");
  },
  get api(): Logger {
    return getServiceLogger("api");
  },
  get prices(): Logger {
    return getServiceLogger("prices");
  },
  get startup(): Logger {
    return getServiceLogger("startup");
  },
};

/**
 * Logger that discards everything, for tests and dry runs
 */
export function createSilentLogger(): Logger {
  const noop = (): void => {};
  const silent: Logger = {
    level: "fatal",
    trace: noop,
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    fatal: noop,
    child: () => silent,
  };
  return silent;
}

export { createLogger, getLogLevelFromEnv, shouldPrettyPrint };
