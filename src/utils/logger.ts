/**
 * Leveled console logger shared by the CLI and the pipeline.
 * The level is process-wide and set once from the global CLI flags.
 */

export const LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

let currentLogLevel: LogLevel = LogLevel.INFO;

/**
 * Sets the maximum level that will be written to the console.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export const logger = {
  debug: (message: string): void => {
    if (currentLogLevel >= LogLevel.DEBUG) {
      console.debug(message);
    }
  },
  info: (message: string): void => {
    if (currentLogLevel >= LogLevel.INFO) {
      console.log(message);
    }
  },
  warn: (message: string): void => {
    if (currentLogLevel >= LogLevel.WARN) {
      console.warn(message);
    }
  },
  error: (message: string): void => {
    if (currentLogLevel >= LogLevel.ERROR) {
      console.error(message);
    }
  },
};
