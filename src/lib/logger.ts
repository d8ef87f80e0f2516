export type EngineLogger = Pick<Console, "info" | "warn" | "error">;

export const consoleLogger: EngineLogger = console;

export const describeError = (
  error: unknown,
  fallbackMessage: string
): { message: string; stack?: string } =>
  error instanceof Error
    ? { message: error.message, stack: error.stack }
    : { message: fallbackMessage };
