export interface Logger {
  info(message: string): void;
  debug(message: string): void;
}

export function createConsoleLogger(debug: boolean): Logger {
  return {
    info: (message) => console.log(message),
    debug: (message) => {
      if (debug) console.log(`[DEBUG] ${message}`);
    }
  };
}
