import { migratePackages } from "./processPackages";

// 导出核心模块
export { migratePackages, ruleKey } from "./processPackages";
export { RULE_CATALOG, findAmbiguousRules, validateRule } from "./rules/catalog";
export {
  ARITY_VARIANTS,
  createExpansionContext,
  expandCatalog,
  expandRule,
  isTemplateUnitName,
  templateUnitName,
} from "./template/expander";
export { renderTemplateUnit } from "./template/render";
export { registerTemplateUnits, withScratchDir } from "./template/register";
export {
  BabelRewriteEngine,
  ENGINE_HELP,
  loadTargetFile,
  renderTargetFile,
} from "./engine/babel-engine";
export type { BabelProgramImage } from "./engine/babel-engine";
export { reconcileImports } from "./imports/import-reconciler";
export {
  describeImports,
  readImportRecords,
  syncImportDeclarations,
} from "./imports/import-set";
export { discoverPackages, resolvePackageSet } from "./workspace/packages";
export {
  normalizeConfig,
  loadConfigFile,
  CONFIG_DEFAULTS,
  DEFAULT_FAMILIES,
} from "./core/config-normalizer";
export type { NormalizedMigrateOptions } from "./core/config-normalizer";
export {
  FatalMigrationError,
  ErrorCategory,
  ErrorSeverity,
  formatError,
  formatErrorForUser,
} from "./core/error-handler";
export type { MigrateError } from "./core/error-handler";
export { createConsoleLogger } from "./core/logger";
export type { Logger } from "./core/logger";
export { runCli } from "./cli/program";

export type * from "./core/types";
export type * from "./types";

export default migratePackages;
