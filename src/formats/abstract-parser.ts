/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Formats keep their own parsing logic; the base class only merges
 * defaults with user options, routes warnings and checks the abort
 * signal between records.
 */

import { ParseError } from "../errors";
import type { ParserOptions } from "../types";

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected options: TOptions;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseDefaults: ParserOptions = {
      onWarning: (warning: string, lineNumber?: number): void => {
        const where = lineNumber === undefined ? "" : ` (line ${lineNumber})`;
        console.warn(`${this.getFormatName()} Warning${where}: ${warning}`);
      },
    };

    // Merge in order: base -> format-specific -> user options
    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
    this.interruptHandler = new InterruptHandler(() => this.options.signal);
  }

  /**
   * Get format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Get format name for error messages and logging
   */
  protected abstract getFormatName(): string;

  /**
   * Read the next record
   */
  abstract read(): Promise<T>;

  /**
   * Report a non-fatal condition through the configured warning handler
   */
  protected warn(warning: string, lineNumber?: number): void {
    this.options.onWarning?.(warning, lineNumber);
  }

  /**
   * Check if parsing operation should be aborted
   * Call this in parsing loops to enable Ctrl+C interruption
   */
  protected checkAborted(): void {
    this.interruptHandler.checkAborted(this.getFormatName());
  }
}

/**
 * Utility class for AbortSignal integration
 */
class InterruptHandler {
  constructor(private readonly signal: () => AbortSignal | undefined) {}

  /**
   * @throws {ParseError} If operation was aborted
   */
  checkAborted(format: string): void {
    if (this.signal()?.aborted) {
      throw new ParseError("Operation was aborted", format);
    }
  }
}
