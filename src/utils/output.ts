/**
 * Output manager for controlling console output verbosity
 *
 * Supports three levels:
 * - quiet: Only errors and user output
 * - normal: Errors, warnings, info, and user output (default)
 * - verbose: All output including per-entry copy lines
 *
 * Modes that write rewritten content to stdout switch the manager to
 * stderr-only via `useStderr()`.
 */

export type OutputLevel = 'quiet' | 'normal' | 'verbose';

class OutputManager {
  private static instance: OutputManager | null = null;
  private level: OutputLevel = 'normal';
  private stdoutReserved = false;

  private constructor() {
    this.level = OutputManager.levelFromEnv();
  }

  private static levelFromEnv(): OutputLevel {
    if (process.env.CASECOPY_QUIET === '1') return 'quiet';
    if (process.env.CASECOPY_VERBOSE === '1') return 'verbose';
    return 'normal';
  }

  static getInstance(): OutputManager {
    if (!OutputManager.instance) {
      OutputManager.instance = new OutputManager();
    }
    return OutputManager.instance;
  }

  /**
   * Set output level (CLI flags override environment variables)
   */
  setLevel(level: OutputLevel): void {
    this.level = level;
  }

  /**
   * Re-read level from the environment and release stdout (for testing)
   */
  reset(): void {
    this.level = OutputManager.levelFromEnv();
    this.stdoutReserved = false;
  }

  /**
   * Route info, success and verbose messages to stderr
   */
  useStderr(): void {
    this.stdoutReserved = true;
  }

  private print(message: string): void {
    if (this.stdoutReserved) {
      console.error(message);
    } else {
      console.log(message);
    }
  }

  /**
   * Info message - shown in normal and verbose modes
   */
  info(message: string): void {
    if (this.level !== 'quiet') {
      this.print(message);
    }
  }

  /**
   * Success message - shown in normal and verbose modes
   */
  success(message: string): void {
    if (this.level !== 'quiet') {
      this.print(message);
    }
  }

  /**
   * Warning message - always shown
   */
  warn(message: string): void {
    console.warn(message);
  }

  /**
   * Error message - always shown
   */
  error(message: string): void {
    console.error(message);
  }

  /**
   * Verbose/debug message - only shown in verbose mode
   */
  verbose(message: string): void {
    if (this.level === 'verbose') {
      this.print(message);
    }
  }
}

// Export singleton instance
export const output = OutputManager.getInstance();
