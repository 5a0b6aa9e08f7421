export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// stdout is reserved for the MCP stdio transport.
export function createConsoleLogger(scope: string): Logger {
  const write = (level: string, message: string): void => {
    console.error(`[${new Date().toISOString()}] ${level} ${scope}: ${message}`);
  };
  return {
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message)
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {}
};
