/**
 * Logger class for consistent output formatting.
 *
 * Diagnostics (everything but `print` and `write`) go to stderr so that
 * stdout carries only the catalog listing or a merged document.
 */
export class Logger {
  private verbose = false;
  private quiet = false;

  setVerbose(verbose: boolean) {
    this.verbose = verbose;
  }

  setQuiet(quiet: boolean) {
    this.quiet = quiet;
  }

  info(message: string, ...args: unknown[]) {
    if (!this.quiet) {
      console.error(message, ...args);
    }
  }

  success(message: string, ...args: unknown[]) {
    if (!this.quiet) {
      console.error(`✓ ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]) {
    if (!this.quiet) {
      console.error(`⚠ ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]) {
    console.error(`✗ ${message}`, ...args);
  }

  debug(message: string, ...args: unknown[]) {
    if (this.verbose) {
      console.error(`[DEBUG] ${message}`, ...args);
    }
  }

  /**
   * Normal program output, one line
   */
  print(message: string) {
    console.log(message);
  }

  /**
   * Raw program output, written as-is
   */
  write(data: string | Uint8Array) {
    process.stdout.write(data);
  }
}

export const logger = new Logger();
