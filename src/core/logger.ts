/**
 * 控制台日志
 * 包报告与文件报告走 stdout，警告和错误走 stderr，debug 只在 verbose 时输出
 */

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export function createConsoleLogger(verbose = false): Logger {
  return {
    log: (message) => console.log(message),
    warn: (message) => console.warn(message),
    error: (message) => console.error(message),
    debug: (message) => {
      if (verbose) console.log(message);
    },
  };
}

export const consoleLogger: Logger = createConsoleLogger();
