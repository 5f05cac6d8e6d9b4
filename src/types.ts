import type { Logger } from "./core/logger";
import type { RewriteEngine, RewriteFamily } from "./core/types";
import type { MigrateError } from "./core/error-handler";

/**
 * 迁移选项
 */
export interface MigrateOptions {
  /** 工作区根目录，默认 process.cwd() */
  root?: string;
  /** 同时迁移所有（间接）依赖所选包的包 */
  transitive?: boolean;
  /** 输出每条规则的匹配诊断 */
  verbose?: boolean;
  /** 只报告匹配，不写回文件 */
  dryRun?: boolean;
  /** 配置文件路径；未指定时在根目录查找 assert-migrate.config.json */
  configFile?: string;
  /** 覆盖默认的改写族 */
  families?: RewriteFamily[];
  /** 包内源文件的 glob 模式 */
  include?: string;
  ignore?: string[];
  /** 模板单元临时目录的父目录，默认系统临时目录 */
  scratchDir?: string;
  logger?: Logger;
  engine?: RewriteEngine;
}

/**
 * 配置文件中允许的字段
 */
export type MigrateConfigFile = Pick<
  MigrateOptions,
  | "transitive"
  | "verbose"
  | "dryRun"
  | "families"
  | "include"
  | "ignore"
  | "scratchDir"
>;

export interface FileOutcome {
  filePath: string;
  packageName: string;
  matches: number;
  written: boolean;
}

export interface MigrationResult {
  templateCount: number;
  visitedPackages: string[];
  files: FileOutcome[];
  /** 键为 `<规则>/<族>` */
  ruleMatches: Record<string, number>;
  warnings: MigrateError[];
}
