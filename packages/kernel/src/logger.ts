/** Where the pipeline reports progress and advisory conditions. */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
};

/** For stdio protocols where stdout is not ours. */
export const stderrLogger: Logger = {
  info: (message) => console.error(message),
  warn: (message) => console.error(`warning: ${message}`),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
};
