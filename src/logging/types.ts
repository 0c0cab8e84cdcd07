export type LogLevel = 'quiet' | 'normal' | 'verbose';

export interface Logger {
  info(message: string): void;
  success?(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  header?(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  useColors?: boolean;
  /**
   * Send every message to stderr, keeping stdout free for machine-readable output.
   */
  stderrOnly?: boolean;
}
