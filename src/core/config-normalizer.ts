/**
 * 配置规范化模块
 * 合并配置文件、调用方选项和默认值，得到所有字段都有确定值的配置
 */

import fs from "fs";
import path from "path";
import type { MigrateConfigFile, MigrateOptions } from "../types";
import type { ModuleBinding, RewriteFamily } from "./types";
import type { Logger } from "./logger";
import { createConsoleLogger } from "./logger";
import { abortWith } from "./error-handler";

/**
 * 默认值常量 - 集中定义所有默认值
 */
export const CONFIG_DEFAULTS = {
  CONFIG_FILE_NAME: "assert-migrate.config.json",
  INCLUDE: "**/*.{ts,tsx,mts,cts,js,jsx,mjs,cjs}",
  IGNORE: ["**/node_modules/**", "**/dist/**", "**/*.d.ts"],
  TRANSITIVE: false,
  VERBOSE: false,
  DRY_RUN: false,
  CONTEXT_TYPE: { name: "TB", path: "testutil/testing" },
  HELPER: { alias: "h", path: "testutil/h" },
} as const;

export const DEFAULT_FAMILIES: readonly RewriteFamily[] = [
  {
    name: "strict",
    source: { alias: "must", path: "testify/require" },
    destination: { alias: "gassert", path: "testutil/assert" },
    helper: { ...CONFIG_DEFAULTS.HELPER },
    contextType: { ...CONFIG_DEFAULTS.CONTEXT_TYPE },
  },
  {
    name: "soft",
    source: { alias: "assert", path: "testify/assert" },
    destination: { alias: "gexpect", path: "testutil/expect" },
    helper: { ...CONFIG_DEFAULTS.HELPER },
    contextType: { ...CONFIG_DEFAULTS.CONTEXT_TYPE },
  },
];

/**
 * 规范化的迁移配置
 */
export interface NormalizedMigrateOptions {
  root: string;
  transitive: boolean;
  verbose: boolean;
  dryRun: boolean;
  families: RewriteFamily[];
  include: string;
  ignore: string[];
  scratchDir?: string;
  logger: Logger;
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function validateBinding(binding: ModuleBinding, field: string): void {
  if (!IDENTIFIER.test(binding.alias)) {
    abortWith("CONFIG001", [`${field}.alias`]);
  }
  if (!binding.path) {
    abortWith("CONFIG001", [`${field}.path`]);
  }
}

/**
 * 检查改写族：别名是合法标识符，族名唯一，源路径不与任何目标路径重叠
 */
export function validateFamilies(families: readonly RewriteFamily[]): void {
  if (families.length === 0) {
    abortWith("CONFIG001", ["families"]);
  }
  const names = new Set<string>();
  families.forEach((family, index) => {
    const field = `families[${index}]`;
    if (!family.name || names.has(family.name)) {
      abortWith("CONFIG001", [`${field}.name`]);
    }
    names.add(family.name);
    validateBinding(family.source, `${field}.source`);
    validateBinding(family.destination, `${field}.destination`);
    if (family.helper) validateBinding(family.helper, `${field}.helper`);
    if (!IDENTIFIER.test(family.contextType.name) || !family.contextType.path) {
      abortWith("CONFIG001", [`${field}.contextType`]);
    }
  });

  const sourcePaths = new Set(families.map((f) => f.source.path));
  families.forEach((family, index) => {
    if (sourcePaths.has(family.destination.path)) {
      abortWith("CONFIG001", [`families[${index}].destination.path`]);
    }
  });
}

function readFamilies(value: unknown): RewriteFamily[] {
  if (!Array.isArray(value)) abortWith("CONFIG001", ["families"]);
  return value.map((raw: unknown, index) => {
    const field = `families[${index}]`;
    if (!isRecord(raw)) abortWith("CONFIG001", [field]);
    const entry = raw;
    const binding = (key: string): ModuleBinding | undefined => {
      const value = entry[key];
      if (value === undefined) return undefined;
      if (!isRecord(value) || typeof value.alias !== "string" || typeof value.path !== "string") {
        abortWith("CONFIG001", [`${field}.${key}`]);
      }
      return { alias: value.alias, path: value.path };
    };
    const source = binding("source");
    const destination = binding("destination");
    if (typeof entry.name !== "string") abortWith("CONFIG001", [`${field}.name`]);
    if (!source) abortWith("CONFIG001", [`${field}.source`]);
    if (!destination) abortWith("CONFIG001", [`${field}.destination`]);

    let contextType: RewriteFamily["contextType"] = { ...CONFIG_DEFAULTS.CONTEXT_TYPE };
    const rawContext = entry.contextType;
    if (rawContext !== undefined) {
      if (!isRecord(rawContext) || typeof rawContext.name !== "string" || typeof rawContext.path !== "string") {
        abortWith("CONFIG001", [`${field}.contextType`]);
      }
      contextType = { name: rawContext.name, path: rawContext.path };
    }
    return {
      name: entry.name,
      source,
      destination,
      helper: binding("helper"),
      contextType,
    };
  });
}

/**
 * 读取并校验 JSON 配置文件
 */
export function loadConfigFile(filePath: string): MigrateConfigFile {
  if (!fs.existsSync(filePath)) {
    abortWith("CONFIG002", [filePath], { filePath });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    abortWith("CONFIG003", [filePath], {
      filePath,
      originalError: error instanceof Error ? error : undefined,
    });
  }
  if (!isRecord(parsed)) {
    abortWith("CONFIG003", [filePath], { filePath });
  }

  const config: MigrateConfigFile = {};
  for (const key of ["transitive", "verbose", "dryRun"] as const) {
    const value = parsed[key];
    if (value === undefined) continue;
    if (typeof value !== "boolean") abortWith("CONFIG001", [key], { filePath });
    config[key] = value;
  }
  for (const key of ["include", "scratchDir"] as const) {
    const value = parsed[key];
    if (value === undefined) continue;
    if (typeof value !== "string") abortWith("CONFIG001", [key], { filePath });
    config[key] = value;
  }
  if (parsed.ignore !== undefined) {
    const ignore = parsed.ignore;
    if (!Array.isArray(ignore) || !ignore.every((item): item is string => typeof item === "string")) {
      abortWith("CONFIG001", ["ignore"], { filePath });
    }
    config.ignore = ignore;
  }
  if (parsed.families !== undefined) {
    config.families = readFamilies(parsed.families);
  }
  return config;
}

/**
 * 规范化配置：调用方选项 > 配置文件 > 默认值
 */
export function normalizeConfig(options: MigrateOptions = {}): NormalizedMigrateOptions {
  const root = path.resolve(options.root ?? process.cwd());

  let fileConfig: MigrateConfigFile = {};
  if (options.configFile) {
    fileConfig = loadConfigFile(path.resolve(root, options.configFile));
  } else {
    const detected = path.join(root, CONFIG_DEFAULTS.CONFIG_FILE_NAME);
    if (fs.existsSync(detected)) {
      fileConfig = loadConfigFile(detected);
    }
  }

  const families = options.families ?? fileConfig.families ?? DEFAULT_FAMILIES.map((f) => ({ ...f }));
  validateFamilies(families);

  const verbose = options.verbose ?? fileConfig.verbose ?? CONFIG_DEFAULTS.VERBOSE;
  const scratchDir = options.scratchDir ?? fileConfig.scratchDir;

  return {
    root,
    transitive: options.transitive ?? fileConfig.transitive ?? CONFIG_DEFAULTS.TRANSITIVE,
    verbose,
    dryRun: options.dryRun ?? fileConfig.dryRun ?? CONFIG_DEFAULTS.DRY_RUN,
    families,
    include: options.include ?? fileConfig.include ?? CONFIG_DEFAULTS.INCLUDE,
    ignore: options.ignore ?? fileConfig.ignore ?? [...CONFIG_DEFAULTS.IGNORE],
    scratchDir: scratchDir ? path.resolve(root, scratchDir) : undefined,
    logger: options.logger ?? createConsoleLogger(verbose),
  };
}
