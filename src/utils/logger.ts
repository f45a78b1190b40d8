/**
 * Structured logging utility with security-aware sanitization
 * Credentials (auth tokens, passwords, cookies) must never reach the log stream
 */

import pino from "pino";

const nodeEnv = process.env.NODE_ENV ?? "development";
const isDevelopment = nodeEnv === "development";

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (nodeEnv === "test") return "silent";
  return isDevelopment ? "debug" : "info";
}

const pinoLogger = pino({
  level: resolveLevel(),
  transport: isDevelopment
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }
    : undefined,
  redact: {
    paths: [
      "*.password",
      "*.authToken",
      "*.apiKey",
      "*.secret",
      "headers.authorization",
      "headers.Authorization",
      "headers.cookie",
    ],
    remove: true,
  },
  serializers: {
    error: pino.stdSerializers.err,
  },
});

type LogFn = (message: string, context?: object) => void;

export interface Logger {
  info: LogFn;
  error: LogFn;
  warn: LogFn;
  debug: LogFn;
  fatal: LogFn;
  trace: LogFn;
}

type Level = keyof Logger;

function bindLevel(target: pino.Logger, level: Level, sanitize: boolean): LogFn {
  return (message, context) => {
    if (!context) {
      target[level](message);
      return;
    }
    const payload = sanitize ? sanitizeForLogging(context) : context;
    target[level](isObject(payload) ? payload : { value: payload }, message);
  };
}

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

function wrap(target: pino.Logger, sanitize: boolean): Logger {
  return {
    info: bindLevel(target, "info", sanitize),
    error: bindLevel(target, "error", sanitize),
    warn: bindLevel(target, "warn", sanitize),
    debug: bindLevel(target, "debug", sanitize),
    fatal: bindLevel(target, "fatal", sanitize),
    trace: bindLevel(target, "trace", sanitize),
  };
}

/**
 * Logger wrapper with convenient API
 * Accepts (message, context) instead of pino's (context, message)
 */
export const logger: Logger & {
  child: (bindings: Record<string, unknown>) => Logger;
} = {
  ...wrap(pinoLogger, false),
  child: (bindings) => {
    const sanitizedBindings = sanitizeForLogging(bindings);
    const childPino = pinoLogger.child(
      isObject(sanitizedBindings) ? sanitizedBindings : {}
    );
    return wrap(childPino, true);
  },
};

const SENSITIVE_KEYS = [
  "password",
  "authorization",
  "authtoken",
  "token",
  "cookie",
  "secret",
  "apikey",
];

/**
 * Sanitize object before logging to remove sensitive data
 */
export function sanitizeForLogging(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;

  if (typeof obj !== "object") return obj;

  if (obj instanceof Error) {
    return { name: obj.name, message: obj.message };
  }

  if (Array.isArray(obj)) {
    return obj.map(sanitizeForLogging);
  }

  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some((sk) => lowerKey.includes(sk))) {
      sanitized[key] = "[REDACTED]";
    } else if (typeof value === "object") {
      sanitized[key] = sanitizeForLogging(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

/**
 * Create a child logger with context
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export default logger;
