/**
 * Console logger driven by the CLI verbosity flags
 */

export interface LoggerOptions {
  quiet?: boolean;
  verbose?: boolean;
}

export interface Logger {
  log(message: string): void;
  verbose(message: string): void;
  progress(message: string): void;
  error(message: string): void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const isQuiet = options.quiet;
  const isVerbose = options.verbose;

  return {
    log: (message: string) => {
      if (!isQuiet) console.log(message);
    },
    verbose: (message: string) => {
      if (isVerbose && !isQuiet) console.log(message);
    },
    progress: (message: string) => {
      if (!isQuiet) process.stdout.write(message);
    },
    error: (message: string) => {
      console.error(message);
    },
  };
}

