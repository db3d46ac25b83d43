import pino from 'pino';

// =============================================================================
// Structured Logger
// =============================================================================
//
// Usage patterns:
//
//   log.loader.debug({ path }, "loaded")
//   log.model.warn({ path, code }, "diagnostic")
//   log.output.error({ path, error: err.message }, "write failed")
//
// Every component gets its own child logger so output can be filtered by
// `component`.
// =============================================================================

const LEVELS: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function readLevel(raw: string | undefined): pino.LevelWithSilent {
  const match = LEVELS.find((level) => level === raw?.trim().toLowerCase());
  return match ?? 'info';
}

const baseConfig: pino.LoggerOptions = {
  level: readLevel(process.env.LOG_LEVEL),

  formatters: {
    level: (label) => ({ level: label })
  },

  timestamp: pino.stdTimeFunctions.isoTime
};

// Synchronous stderr keeps log lines ordered with CLI exit and out of stdout.
export const logger = pino(baseConfig, pino.destination({ dest: 2, sync: true }));

export const log = {
  loader: logger.child({ component: 'loader' }),
  model: logger.child({ component: 'model' }),
  metrics: logger.child({ component: 'metrics' }),
  insights: logger.child({ component: 'insights' }),
  render: logger.child({ component: 'render' }),
  output: logger.child({ component: 'output' }),
  pipeline: logger.child({ component: 'pipeline' }),
  cli: logger.child({ component: 'cli' })
};

/** Switch the level of the root logger and every component logger. */
export function setLogLevel(level: pino.LevelWithSilent): void {
  logger.level = level;
  for (const child of Object.values(log)) {
    child.level = level;
  }
}

/**
 * Create a timer for measuring operation duration
 */
export function createTimer(): () => string {
  const start = process.hrtime.bigint();
  return () => {
    const end = process.hrtime.bigint();
    const ms = Number(end - start) / 1_000_000;
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    return `${(ms / 1000).toFixed(2)}s`;
  };
}
