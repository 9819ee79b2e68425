export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export class Logger {
  private static verbosityOverride: LogLevel | undefined;
  private static dateHeaderPrinted = false;

  /**
   * Pin the verbosity, ignoring LOG_VERBOSITY. Pass undefined to go back to the environment.
   */
  static setVerbosity(level: LogLevel | undefined): void {
    this.verbosityOverride = level;
  }

  static get verbosity(): number {
    if (this.verbosityOverride !== undefined) {
      return this.verbosityOverride;
    }
    const level = parseInt(process.env.LOG_VERBOSITY ?? '', 10);
    return Number.isNaN(level) ? LogLevel.WARN : level;
  }

  private static printDateHeaderIfNeeded(): void {
    if (!this.dateHeaderPrinted) {
      const date = new Date().toISOString().split('T')[0];
      console.log(`\n===== DATE:${date} =====`);
      this.dateHeaderPrinted = true;
    }
  }

  private static formatTime(): string {
    return new Date().toTimeString().split(' ')[0]; // HH:MM:SS
  }

  static info(message: string, ...args: unknown[]): void {
    if (this.verbosity >= LogLevel.INFO) {
      this.printDateHeaderIfNeeded();
      console.log(`${this.formatTime()} [INFO] ${message}`, ...args);
    }
  }

  static warn(message: string, ...args: unknown[]): void {
    if (this.verbosity >= LogLevel.WARN) {
      this.printDateHeaderIfNeeded();
      console.warn(`${this.formatTime()} [WARN] 🔴 ${message}`, ...args);
    }
  }

  static error(message: string, ...args: unknown[]): void {
    this.printDateHeaderIfNeeded();
    console.error(`${this.formatTime()} [ERROR] 🔴🔴 ${message}`, ...args);
  }

  static debug(message: string, ...args: unknown[]): void {
    if (this.verbosity >= LogLevel.DEBUG) {
      this.printDateHeaderIfNeeded();
      console.log(`${this.formatTime()} [DEBUG] ${message}`, ...args);
    }
  }
}
