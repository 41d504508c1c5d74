import chalk from "chalk";

export type Logger = {
  info: (message: string) => void;
  success: (message: string) => void;
  skip: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
};

export interface LoggerOptions {
  /** Print `debug` lines */
  verbose?: boolean;
  /** Colour output; defaults to chalk's terminal detection */
  color?: boolean;
  write?: (line: string) => void;
  writeError?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const palette = options.color === false ? new chalk.Instance({ level: 0 }) : chalk;
  const write = options.write ?? ((line: string) => console.log(line));
  const writeError = options.writeError ?? ((line: string) => console.error(line));
  const verbose = options.verbose ?? false;

  return {
    info: (message) => write(message),
    success: (message) => write(`${palette.green("✓")} ${message}`),
    skip: (message) => write(palette.gray(`- ${message}`)),
    warn: (message) => writeError(palette.yellow(`⚠ ${message}`)),
    error: (message) => writeError(palette.red(`❌ ${message}`)),
    debug: (message) => {
      if (verbose) {
        write(palette.dim(message));
      }
    },
  };
}
