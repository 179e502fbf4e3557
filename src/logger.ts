const PREFIX = "[inbox-harvest]";

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

/** Anything with a string `write`, e.g. process.stdout. */
export interface LineSink {
  write(line: string): unknown;
}

export interface LoggerOptions {
  verbose?: boolean;
  stdout?: LineSink;
  stderr?: LineSink;
}

/**
 * Operator console logger.
 *
 * Progress goes to stdout unprefixed, so a run reads like a transcript.
 * Warnings, errors and (with `verbose`) debug lines go to stderr.
 */
export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;
  private readonly stdout: LineSink;
  private readonly stderr: LineSink;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
  }

  debug(msg: string): void {
    if (this.verbose) {
      this.stderr.write(`${PREFIX} ${msg}\n`);
    }
  }

  info(msg: string): void {
    this.stdout.write(`${msg}\n`);
  }

  warn(msg: string): void {
    this.stderr.write(`${PREFIX} warning: ${msg}\n`);
  }

  error(msg: string): void {
    this.stderr.write(`${PREFIX} error: ${msg}\n`);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new ConsoleLogger(options);
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
