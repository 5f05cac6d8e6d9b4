/**
 * 错误处理模块
 * 提供统一的错误处理机制，包括错误类型、错误生成和格式化方法
 */

import type { Logger } from "./logger";
import { consoleLogger } from "./logger";

// 错误类别枚举
export enum ErrorCategory {
  CONFIG = "CONFIG", // 配置错误
  TEMPLATE = "TEMPLATE", // 模板单元生成错误
  PROGRAM_LOAD = "PROGRAM_LOAD", // 程序加载错误
  MATCH = "MATCH", // 匹配器应用错误
  IMPORT = "IMPORT", // 导入整理错误
  FILE_OPERATION = "FILE_OPERATION", // 文件操作错误
  UNKNOWN = "UNKNOWN", // 未知错误
}

// 错误严重级别
export enum ErrorSeverity {
  WARNING = "WARNING", // 警告，不会中断处理
  ERROR = "ERROR", // 错误，当前文件的迁移可能不完整
  FATAL = "FATAL", // 致命错误，中断整个迁移流程
}

// 统一错误接口
export interface MigrateError {
  code: string; // 错误代码，例如 CONFIG001
  category: ErrorCategory; // 错误类别
  message: string; // 错误信息
  details?: string; // 详细信息
  filePath?: string; // 相关文件路径
  line?: number; // 行号
  column?: number; // 列号
  severity: ErrorSeverity; // 严重级别
  suggestion?: string; // 修复建议
  originalError?: Error; // 原始错误
}

// 预定义错误代码和对应信息
interface ErrorDefinition {
  code: string;
  category: ErrorCategory;
  messageTemplate: string;
  severity: ErrorSeverity;
  suggestionTemplate?: string;
}

// 错误定义集
const errorDefinitions: Record<string, ErrorDefinition> = {
  // 配置错误
  CONFIG001: {
    code: "CONFIG001",
    category: ErrorCategory.CONFIG,
    messageTemplate: "配置无效: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请检查配置格式是否正确，特别是 {0} 字段",
  },
  CONFIG002: {
    code: "CONFIG002",
    category: ErrorCategory.CONFIG,
    messageTemplate: "找不到指定的配置文件: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请确认配置文件路径是否正确",
  },
  CONFIG003: {
    code: "CONFIG003",
    category: ErrorCategory.CONFIG,
    messageTemplate: "配置文件无法解析: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "配置文件必须是合法的 JSON 对象",
  },

  // 模板单元生成错误
  TEMPLATE001: {
    code: "TEMPLATE001",
    category: ErrorCategory.TEMPLATE,
    messageTemplate: "写入模板单元失败: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请确认临时目录 {1} 存在且有写入权限",
  },
  TEMPLATE002: {
    code: "TEMPLATE002",
    category: ErrorCategory.TEMPLATE,
    messageTemplate: "注册模板单元失败: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate:
      "模板单元缺失会悄悄缩小迁移范围，因此整个运行被中止",
  },
  TEMPLATE003: {
    code: "TEMPLATE003",
    category: ErrorCategory.TEMPLATE,
    messageTemplate: "规则目录无效: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate:
      "每个调用形状只能对应一条规则，before / after 必须引用相同的参数",
  },

  // 程序加载错误
  LOAD001: {
    code: "LOAD001",
    category: ErrorCategory.PROGRAM_LOAD,
    messageTemplate: "解析文件失败: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate:
      "请检查文件语法是否正确，特别是第 {1} 行附近",
  },
  LOAD002: {
    code: "LOAD002",
    category: ErrorCategory.PROGRAM_LOAD,
    messageTemplate: "没有包匹配: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate:
      "参数可以是包名、包名 glob（如 @scope/*）或包目录路径",
  },
  LOAD003: {
    code: "LOAD003",
    category: ErrorCategory.PROGRAM_LOAD,
    messageTemplate: "无法读取包清单: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请确认 package.json 是合法的 JSON",
  },
  LOAD004: {
    code: "LOAD004",
    category: ErrorCategory.PROGRAM_LOAD,
    messageTemplate: "模板单元 {0} 无效: {1}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate:
      "模板单元必须恰好包含签名相同的 before 和 after 函数，函数体各为一个调用",
  },

  // 匹配错误
  MATCH001: {
    code: "MATCH001",
    category: ErrorCategory.MATCH,
    messageTemplate: "匹配器 {0} 应用失败: {1}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "该文件中此规则未被迁移，请人工检查",
  },

  // 导入整理
  IMPORT001: {
    code: "IMPORT001",
    category: ErrorCategory.IMPORT,
    messageTemplate: "源导入 {0} 仍被引用，已保留",
    severity: ErrorSeverity.WARNING,
    suggestionTemplate: "文件中还有无法自动迁移的调用，请人工处理后删除该导入",
  },
  IMPORT002: {
    code: "IMPORT002",
    category: ErrorCategory.IMPORT,
    messageTemplate: "无法把 {0} 的导入别名改为 {1}: 名称已被占用",
    severity: ErrorSeverity.WARNING,
    suggestionTemplate: "请重命名文件中已有的 {1} 绑定",
  },

  // 文件操作错误
  FILE001: {
    code: "FILE001",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "读取文件失败: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请确认文件存在且有读取权限，检查文件路径是否正确",
  },
  FILE002: {
    code: "FILE002",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "写入文件失败: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请确认目标文件可写，检查磁盘空间是否足够",
  },

  // 通用错误
  GENERAL001: {
    code: "GENERAL001",
    category: ErrorCategory.UNKNOWN,
    messageTemplate: "未知错误: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "如果问题持续存在，请提交问题报告",
  },
};

/**
 * 中止整个迁移运行的错误
 */
export class FatalMigrationError extends Error {
  readonly detail: MigrateError;

  constructor(detail: MigrateError) {
    super(`[${detail.code}] ${detail.message}`);
    this.name = "FatalMigrationError";
    this.detail = detail;
  }
}

/**
 * 创建格式化的错误对象
 */
export function createMigrateError(
  errorCode: string,
  params: string[] = [],
  options: {
    filePath?: string;
    line?: number;
    column?: number;
    originalError?: Error;
  } = {}
): MigrateError {
  const definition = errorDefinitions[errorCode] ?? errorDefinitions.GENERAL001;

  // 替换消息模板中的参数
  let message = definition.messageTemplate;
  let suggestion = definition.suggestionTemplate || "";

  params.forEach((param, index) => {
    message = message.split(`{${index}}`).join(param);
    suggestion = suggestion.split(`{${index}}`).join(param);
  });

  // 从原始错误中提取位置信息（如果有）
  let line = options.line;
  let column = options.column;

  if (options.originalError && !line && !column) {
    const babelMatch = options.originalError.message.match(/\((\d+):(\d+)\)/);
    if (babelMatch) {
      line = parseInt(babelMatch[1], 10);
      column = parseInt(babelMatch[2], 10);
    }
  }

  return {
    code: definition.code,
    category: definition.category,
    message,
    details: options.originalError?.message,
    filePath: options.filePath,
    line,
    column,
    severity: definition.severity,
    suggestion,
    originalError: options.originalError,
  };
}

/**
 * 创建错误并以 FatalMigrationError 抛出
 */
export function abortWith(
  errorCode: string,
  params: string[] = [],
  options: Parameters<typeof createMigrateError>[2] = {}
): never {
  throw new FatalMigrationError(createMigrateError(errorCode, params, options));
}

/**
 * 格式化错误为日志消息
 */
export function formatError(error: MigrateError): string {
  let formattedMessage = `[${error.code}] ${error.message}`;

  if (error.filePath) {
    formattedMessage += `\n文件: ${error.filePath}`;
    if (error.line) {
      formattedMessage += `:${error.line}`;
      if (error.column) {
        formattedMessage += `:${error.column}`;
      }
    }
  }

  if (error.details && error.details !== error.message) {
    formattedMessage += `\n详情: ${error.details}`;
  }

  if (error.suggestion) {
    formattedMessage += `\n建议: ${error.suggestion}`;
  }

  return formattedMessage;
}

/**
 * 记录错误
 */
export function logError(error: MigrateError, logger: Logger = consoleLogger): void {
  const formattedError = formatError(error);

  if (error.severity === ErrorSeverity.WARNING) {
    logger.warn(formattedError);
  } else {
    logger.error(formattedError);
  }
}

/**
 * 提供给最终用户的错误格式化方法
 */
export function formatErrorForUser(error: MigrateError): string {
  let message = `错误(${error.code}): ${error.message}`;

  if (error.filePath) {
    message += `\n文件位置: ${error.filePath}`;
    if (error.line) {
      message += ` 第 ${error.line} 行`;
      if (error.column) {
        message += ` 第 ${error.column} 列`;
      }
    }
  }

  if (error.suggestion) {
    message += `\n\n修复建议:\n${error.suggestion}`;
  }

  return message;
}

/**
 * 把任意异常归类为 MigrateError；FatalMigrationError 原样取出
 */
export function enhanceError(error: unknown, filePath?: string): MigrateError {
  if (error instanceof FatalMigrationError) {
    return error.detail;
  }
  const original = error instanceof Error ? error : new Error(String(error));
  const errorMessage = original.message;

  if (
    errorMessage.includes("Unexpected token") ||
    errorMessage.includes("BABEL_PARSER_SYNTAX_ERROR")
  ) {
    const lineMatch = errorMessage.match(/\((\d+):(\d+)\)/);
    return createMigrateError(
      "LOAD001",
      [filePath || errorMessage, lineMatch ? lineMatch[1] : "?"],
      { filePath, originalError: original }
    );
  }

  if (errorMessage.includes("ENOENT") || errorMessage.includes("no such file")) {
    return createMigrateError("FILE001", [filePath || errorMessage], {
      filePath,
      originalError: original,
    });
  }

  return createMigrateError("GENERAL001", [errorMessage], {
    filePath,
    originalError: original,
  });
}
