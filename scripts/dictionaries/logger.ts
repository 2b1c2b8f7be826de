export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const createLogger = (tag: string): Logger => {
  const prefix = `[${tag}]`;
  return {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message) => console.error(`${prefix} ${message}`)
  };
};
