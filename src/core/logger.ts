import pino from 'pino';

/**
 * Structured logging with Pino.
 *
 * Every line goes to stdout and to the log file, as JSON with an
 * ISO timestamp. Modules receive a Logger rather than importing one.
 */

export type Logger = pino.Logger;

export interface LoggerOptions {
  level: pino.LevelWithSilent;
  /** Omit to log to stdout only */
  file?: string;
}

export function createLogger(options: LoggerOptions): Logger {
  const streams: pino.StreamEntry[] = [{ stream: process.stdout, level: levelOrInfo(options.level) }];
  if (options.file) {
    streams.push({
      stream: pino.destination({ dest: options.file, sync: true, mkdir: true }),
      level: levelOrInfo(options.level),
    });
  }

  return pino(
    {
      name: 'nse-insider-tracker',
      level: options.level,
      timestamp: pino.stdTimeFunctions.isoTime,
      base: undefined,
    },
    pino.multistream(streams)
  );
}

/** A logger that drops everything, for tests and library callers */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

// multistream entries take a concrete level
function levelOrInfo(level: pino.LevelWithSilent): pino.Level {
  return level === 'silent' ? 'fatal' : level;
}
