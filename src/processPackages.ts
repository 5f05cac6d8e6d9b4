/**
 * 迁移编排
 * 选包、展开并注册模板单元、加载程序，然后逐文件应用所有匹配器并整理导入
 */

import type { Matcher, RewriteEngine, TargetFile, TemplateUnit } from "./core/types";
import type { FileOutcome, MigrateOptions, MigrationResult } from "./types";
import type { NormalizedMigrateOptions } from "./core/config-normalizer";
import { normalizeConfig } from "./core/config-normalizer";
import {
  abortWith,
  createMigrateError,
  FatalMigrationError,
  logError,
} from "./core/error-handler";
import { RULE_CATALOG } from "./rules/catalog";
import {
  createExpansionContext,
  expandCatalog,
  isTemplateUnitName,
} from "./template/expander";
import { registerTemplateUnits, withScratchDir } from "./template/register";
import { BabelRewriteEngine } from "./engine/babel-engine";
import { reconcileImports } from "./imports/import-reconciler";
import { discoverPackages, resolvePackageSet } from "./workspace/packages";

export function ruleKey(unit: TemplateUnit): string {
  return `${unit.rule.name}/${unit.family.name}`;
}

/**
 * 对单个文件应用所有匹配器，再整理导入；有修改且不是 dry-run 时写回
 */
function migrateFile(
  file: TargetFile,
  matchers: Matcher[],
  unitsByOrdinal: Map<number, TemplateUnit>,
  engine: RewriteEngine,
  config: NormalizedMigrateOptions,
  result: MigrationResult
): FileOutcome {
  const { logger } = config;
  const perRule = new Map<string, number>();
  let total = 0;

  for (const matcher of matchers) {
    let n = 0;
    try {
      n = matcher.apply(file);
    } catch (error) {
      const failure = createMigrateError(
        "MATCH001",
        [matcher.unit.name, error instanceof Error ? error.message : String(error)],
        {
          filePath: file.filePath,
          originalError: error instanceof Error ? error : undefined,
        }
      );
      logError(failure, logger);
      result.warnings.push(failure);
    }
    if (n === 0) continue;

    const unit = unitsByOrdinal.get(matcher.unit.ordinal);
    const key = unit && unit.name === matcher.unit.name ? ruleKey(unit) : matcher.unit.name;
    perRule.set(key, (perRule.get(key) ?? 0) + n);
    result.ruleMatches[key] = (result.ruleMatches[key] ?? 0) + n;
    total += n;
  }

  total += reconcileImports(file, config.families, logger, result.warnings);

  if (config.verbose) {
    for (const [key, n] of perRule) {
      logger.debug(`  ${key}: ${n}`);
    }
  }

  const outcome: FileOutcome = {
    filePath: file.filePath,
    packageName: file.packageName,
    matches: total,
    written: false,
  };
  if (total === 0) return outcome;

  logger.log(`=== ${file.filePath} (${total} matches)`);
  if (config.dryRun) return outcome;

  try {
    engine.writeFile(file.filePath, file);
  } catch (error) {
    if (error instanceof FatalMigrationError) throw error;
    abortWith("FILE002", [file.filePath], {
      filePath: file.filePath,
      originalError: error instanceof Error ? error : undefined,
    });
  }
  outcome.written = true;
  return outcome;
}

/**
 * 迁移匹配 patterns 的包
 */
export async function migratePackages(
  patterns: string[],
  options: MigrateOptions = {}
): Promise<MigrationResult> {
  const config = normalizeConfig(options);
  const { logger } = config;
  const engine: RewriteEngine = options.engine ?? new BabelRewriteEngine();

  const workspace = discoverPackages(config.root, config);
  const roots = resolvePackageSet(workspace, patterns, config);

  const units = expandCatalog(createExpansionContext(), RULE_CATALOG, config.families);
  const unitsByOrdinal = new Map(units.map((unit) => [unit.ordinal, unit]));
  logger.debug(`Expanded ${units.length} template units`);

  return withScratchDir(config.scratchDir, (scratchDir) => {
    const handles = registerTemplateUnits(units, engine, scratchDir);
    const unitNames = new Set(handles.map((handle) => handle.name));
    const program = engine.loadProgram(roots, handles);
    const matchers = handles.map((handle) => engine.makeMatcher(program, handle));

    const result: MigrationResult = {
      templateCount: units.length,
      visitedPackages: [],
      files: [],
      ruleMatches: {},
      warnings: [],
    };

    for (const pkg of program.packages) {
      if (unitNames.has(pkg.name) || isTemplateUnitName(pkg.name)) continue;
      logger.log(`Handling package ${pkg.name}`);
      result.visitedPackages.push(pkg.name);
      for (const file of pkg.files) {
        result.files.push(
          migrateFile(file, matchers, unitsByOrdinal, engine, config, result)
        );
      }
    }

    return result;
  });
}
