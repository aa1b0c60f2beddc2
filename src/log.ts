export interface Logger {
  info(message: string): void;
  success(message: string): void;
  error(message: string): void;
}

const PREFIX = "buildgen:";

export const consoleLogger: Logger = {
  info: (message) => console.log(`${PREFIX} ${message}`),
  success: (message) => console.log(`${PREFIX} ${message}`),
  error: (message) => console.error(`${PREFIX} ${message}`),
};
