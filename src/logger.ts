/**
 * Sink for progress and warning messages. `console` satisfies it.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export const defaultLogger: Logger = console;
