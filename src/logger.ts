export enum LogLevel {
  Phase = 0,
  Step = 1,
  Detail = 2,
}

// Progress narration. Implementations must not throw.
export type LogFn = (level: LogLevel, message: string) => void;

export function createConsoleLog(write: (line: string) => void = console.log): LogFn {
  return (level, message) => {
    write(`${'  '.repeat(level)}${message}`);
  };
}

export const silentLog: LogFn = () => {};

export function debugEnabled(): boolean {
  return !!process.env.DEBUG_DEPLOY;
}
