/**
 * 测试辅助工具
 * 临时工作区、收集输出的 logger，以及直接从源码构造目标文件的函数
 */
import * as fs from "fs";
import * as path from "path";
import { tmpdir } from "os";
import crypto from "crypto";
import type { Logger } from "../src/core/logger";
import type { TargetFile } from "../src/core/types";
import { loadTargetFile } from "../src/engine/babel-engine";
import { FatalMigrationError } from "../src/core/error-handler";

export interface RecordingLogger extends Logger {
  lines: string[];
  warnings: string[];
  errors: string[];
  debugs: string[];
}

export function createRecordingLogger(): RecordingLogger {
  const logger: RecordingLogger = {
    lines: [],
    warnings: [],
    errors: [],
    debugs: [],
    log: (message) => {
      logger.lines.push(message);
    },
    warn: (message) => {
      logger.warnings.push(message);
    },
    error: (message) => {
      logger.errors.push(message);
    },
    debug: (message) => {
      logger.debugs.push(message);
    },
  };
  return logger;
}

const workspaces: string[] = [];

/**
 * 创建临时工作区，files 的键为相对路径
 */
export function createWorkspace(files: Record<string, string>): string {
  const uniqueId = `${Date.now()}-${crypto.randomBytes(6).toString("hex")}`;
  const root = path.join(tmpdir(), `assert-migrate-test-${uniqueId}`);
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
  workspaces.push(root);
  return root;
}

export function removeWorkspaces(): void {
  for (const root of workspaces.splice(0)) {
    fs.rmSync(root, { recursive: true, force: true });
  }
}

export function readWorkspaceFile(root: string, relativePath: string): string {
  return fs.readFileSync(path.join(root, relativePath), "utf8");
}

export function manifest(name: string, dependencies: Record<string, string> = {}): string {
  return JSON.stringify({ name, version: "1.0.0", dependencies }, null, 2);
}

/**
 * 不经过磁盘，直接从源码构造目标文件
 */
export function targetFromCode(code: string, filePath = "/virtual/sample.test.ts"): TargetFile {
  return loadTargetFile(filePath, "sample", code);
}

/**
 * 执行 fn，返回它抛出的 FatalMigrationError 的错误代码
 */
export function fatalCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof FatalMigrationError) return error.detail.code;
    throw error;
  }
  return undefined;
}
