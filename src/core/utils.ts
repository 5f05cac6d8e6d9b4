/**
 * 核心共用工具方法
 * 提供可复用的 AST 解析与代码风格探测
 */

import type { ParserOptions } from "@babel/parser";
import { parse } from "@babel/parser";
import type * as t from "@babel/types";

/**
 * AST解析工具类
 */
export class ASTParserUtils {
  /**
   * 获取默认解析器插件
   */
  static getDefaultParserPlugins(filePath: string): ParserOptions["plugins"] {
    const plugins: ParserOptions["plugins"] = ["decorators-legacy"];

    if (/\.[mc]?tsx?$/.test(filePath)) {
      plugins.push("typescript");

      if (/\.tsx$/.test(filePath)) {
        plugins.push("jsx");
      }
    } else if (/\.[mc]?jsx?$/.test(filePath)) {
      // .js 文件里也常见 JSX
      plugins.push("jsx");
    }

    return plugins;
  }

  /**
   * 获取解析器配置
   */
  static getParserConfig(
    filePath: string,
    additionalPlugins: ParserOptions["plugins"] = []
  ): ParserOptions {
    const defaultConfig: ParserOptions = {
      sourceType: "module" as const,
      plugins: this.getDefaultParserPlugins(filePath),
      strictMode: false,
      sourceFilename: filePath,
    };

    return {
      ...defaultConfig,
      plugins: Array.from(
        new Set([...(defaultConfig.plugins || []), ...(additionalPlugins || [])])
      ),
    };
  }

  /**
   * 安全解析代码
   */
  static parseCode(
    code: string,
    filePath: string,
    additionalPlugins: ParserOptions["plugins"] = []
  ): t.File {
    const config = this.getParserConfig(filePath, additionalPlugins);
    return parse(code, config);
  }
}

/**
 * 代码风格探测，新增的导入语句跟随文件已有的写法
 */
export interface CodeStyle {
  quote: "'" | '"';
  semicolon: boolean;
  newline: "\n" | "\r\n";
}

export function detectCodeStyle(code: string, ast: t.File): CodeStyle {
  const firstImport = ast.program.body.find(
    (statement): statement is t.ImportDeclaration =>
      statement.type === "ImportDeclaration"
  );
  const newline = code.includes("\r\n") ? "\r\n" : "\n";
  if (!firstImport || firstImport.end == null) {
    return { quote: '"', semicolon: true, newline };
  }
  const raw = code.slice(
    firstImport.source.start ?? 0,
    firstImport.source.end ?? 0
  );
  return {
    quote: raw.startsWith("'") ? "'" : '"',
    semicolon: code[firstImport.end - 1] === ";",
    newline,
  };
}

/**
 * 字符串处理工具类
 */
export class StringUtils {
  /**
   * 按给定引号风格输出字符串字面量
   */
  static quote(value: string, quote: CodeStyle["quote"]): string {
    const escaped = value.replace(/\\/g, "\\\\").split(quote).join(`\\${quote}`);
    return `${quote}${escaped}${quote}`;
  }

  /**
   * 从 end 开始吞掉一个换行符（\n 或 \r\n），返回新的结束位置
   */
  static consumeNewline(code: string, end: number): number {
    if (code.startsWith("\r\n", end)) return end + 2;
    if (code[end] === "\n") return end + 1;
    return end;
  }
}
