export interface Logger {
  debug(log: string, ...args: unknown[]): void;
  info(log: string, ...args: unknown[]): void;
  warn(log: string, ...args: unknown[]): void;
  error(log: string, ...args: unknown[]): void;
}

class ConsoleLogger implements Logger {
  constructor(private readonly prefix: string) {}

  debug(log: string, ...args: unknown[]) {
    console.log(`${this.prefix} debug: ${log}`, ...args);
  }
  info(log: string, ...args: unknown[]) {
    console.log(`${this.prefix} info: ${log}`, ...args);
  }
  warn(log: string, ...args: unknown[]) {
    console.error(`${this.prefix} warn: ${log}`, ...args);
  }
  error(log: string, ...args: unknown[]) {
    console.error(`${this.prefix} error: ${log}`, ...args);
  }
}

class NullLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.DEBUG === "true" || env.GIT_PUBLISH_DEBUG === "true";
}

export const logger: Logger = isDebugEnabled()
  ? new ConsoleLogger("git-publish")
  : new NullLogger();
