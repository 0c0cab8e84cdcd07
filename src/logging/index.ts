import chalk from 'chalk';
import type { ConsoleLoggerOptions, LogLevel, Logger } from './types';

class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly useColors: boolean;
  private readonly stderrOnly: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    if (options.quiet) {
      this.level = 'quiet';
    } else if (options.verbose) {
      this.level = 'verbose';
    } else {
      this.level = 'normal';
    }
    this.useColors = options.useColors !== false;
    this.stderrOnly = options.stderrOnly === true;
  }

  private colorize(text: string, colorFn: (text: string) => string): string {
    return this.useColors ? colorFn(text) : text;
  }

  private out(line: string): void {
    if (this.stderrOnly) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  info(message: string): void {
    if (this.level === 'quiet') return;
    this.out(this.colorize(`ℹ️  ${message}`, chalk.blue));
  }

  success(message: string): void {
    if (this.level === 'quiet') return;
    this.out(this.colorize(`✅ ${message}`, chalk.green));
  }

  warning(message: string): void {
    if (this.level === 'quiet') return;
    console.warn(this.colorize(`⚠️  ${message}`, chalk.yellow));
  }

  error(message: string): void {
    console.error(this.colorize(`❌ ${message}`, chalk.red));
  }

  debug(message: string): void {
    if (this.level !== 'verbose') return;
    this.out(this.colorize(`🔍 ${message}`, chalk.gray));
  }

  header(message: string): void {
    if (this.level === 'quiet') return;
    const border = '═'.repeat(message.length + 4);
    this.out(this.colorize(`╔${border}╗`, chalk.cyan));
    this.out(this.colorize(`║  ${message}  ║`, chalk.cyan.bold));
    this.out(this.colorize(`╚${border}╝`, chalk.cyan));
  }
}

let activeLogger: Logger = new ConsoleLogger();

export function setLogger(logger: Logger): void {
  activeLogger = logger;
}

export function resetLogger(): void {
  activeLogger = new ConsoleLogger();
}

export function getLogger(): Logger {
  return activeLogger;
}

export function info(message: string): void {
  activeLogger.info(message);
}

export function success(message: string): void {
  if (activeLogger.success) {
    activeLogger.success(message);
  } else {
    activeLogger.info(message);
  }
}

export function warning(message: string): void {
  activeLogger.warning(message);
}

export function error(message: string): void {
  activeLogger.error(message);
}

export function debug(message: string): void {
  activeLogger.debug(message);
}

export function header(message: string): void {
  if (activeLogger.header) {
    activeLogger.header(message);
  }
}

export { ConsoleLogger };
export type { ConsoleLoggerOptions, LogLevel, Logger } from './types';
