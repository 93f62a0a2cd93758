import pino from "pino";

const root = pino(
  {
    level: process.env.LOG_LEVEL ?? "warn",
    base: null,
  },
  pino.destination(2)
);

/**
 * Module-scoped logger. Writes to stderr so command output on stdout stays
 * pipeable.
 */
export function createLogger(module: string): pino.Logger {
  return root.child({ module });
}
