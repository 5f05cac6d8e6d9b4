/**
 * 导入整理
 * 改写完成后在规范导入集合上做一次清理：移除不再使用的源导入，
 * 改写代码引用的目标 / helper 命名空间统一为族别名，并合并重复的命名空间导入
 */

import type { NodePath } from "@babel/traverse";
import * as t from "@babel/types";
import type { ImportRecord, RewriteFamily, TargetFile } from "../core/types";
import type { Logger } from "../core/logger";
import { consoleLogger } from "../core/logger";
import { createMigrateError, logError } from "../core/error-handler";
import type { MigrateError } from "../core/error-handler";
import { textReplacement } from "../core/text-patcher";
import {
  collectReferencedNames,
  getProgramPath,
  isNamespaceImportOf,
  syncImportDeclarations,
} from "./import-set";

/**
 * 目标与 helper 路径到族别名的映射；多个族共用一个路径时以先出现的为准
 */
function aliasesByPath(families: readonly RewriteFamily[]): Map<string, string> {
  const aliases = new Map<string, string>();
  for (const family of families) {
    for (const binding of [family.destination, family.helper]) {
      if (binding && !aliases.has(binding.path)) {
        aliases.set(binding.path, binding.alias);
      }
    }
  }
  return aliases;
}

function renameReference(
  file: TargetFile,
  ref: NodePath,
  from: string,
  to: string
): void {
  const node = ref.node;
  if (!t.isIdentifier(node) && !t.isJSXIdentifier(node)) return;
  const parent = ref.parent;
  let text = to;

  if (t.isObjectProperty(parent) && parent.shorthand && parent.value === node) {
    parent.shorthand = false;
    parent.key = t.identifier(from);
    text = `${from}: ${to}`;
  } else if (
    t.isExportSpecifier(parent) &&
    parent.local === node &&
    parent.exported.start === node.start
  ) {
    text = `${to} as ${from}`;
  }

  node.name = to;
  if (node.start != null && node.end != null) {
    file.replacements.push(textReplacement(node.start, node.end, text));
  }
}

/**
 * 整理文件的导入，返回 1 表示有修改，0 表示没有
 */
export function reconcileImports(
  file: TargetFile,
  families: readonly RewriteFamily[],
  logger: Logger = consoleLogger,
  warnings: MigrateError[] = []
): number {
  const warn = (code: string, params: string[]): void => {
    const warning = createMigrateError(code, params, { filePath: file.filePath });
    logError(warning, logger);
    warnings.push(warning);
  };

  const programPath = getProgramPath(file.ast);
  programPath.scope.crawl();
  const scope = programPath.scope;
  const sourcePaths = new Set(families.map((family) => family.source.path));
  const aliases = aliasesByPath(families);
  let referenced = collectReferencedNames(file.ast);
  let renamed = false;

  const records: ImportRecord[] = [];
  for (const current of file.imports) {
    const record = { ...current, used: current.local ? referenced.has(current.local) : true };

    if (sourcePaths.has(record.path)) {
      if (record.kind === "side-effect" || !record.used) continue;
      warn("IMPORT001", [`${record.local} (${record.path})`]);
      records.push(record);
      continue;
    }

    const alias = aliases.get(record.path);
    if (
      record.kind === "namespace" &&
      !record.typeOnly &&
      record.local &&
      alias &&
      record.local !== alias &&
      referenced.has(alias) &&
      !scope.getBinding(alias)
    ) {
      // 改写后的调用引用了尚未绑定的族别名，已有的同路径导入改用该别名
      const binding = scope.getBinding(record.local);
      for (const ref of binding?.referencePaths ?? []) {
        renameReference(file, ref, record.local, alias);
      }
      record.local = alias;
      renamed = true;
    } else if (record.declIndex < 0 && record.local) {
      const occupant = scope.getBinding(record.local);
      if (occupant && !isNamespaceImportOf(occupant, record.path)) {
        warn("IMPORT002", [record.path, record.local]);
        continue;
      }
    }
    records.push(record);
  }

  const seen = new Set<string>();
  const deduplicated = records.filter((record) => {
    if (record.kind !== "namespace" || !record.local) return true;
    const key = `${record.typeOnly}|${record.path}|${record.local}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  if (renamed) {
    referenced = collectReferencedNames(file.ast);
  }
  for (const record of deduplicated) {
    record.used = record.local ? referenced.has(record.local) : true;
  }

  const changed = syncImportDeclarations(file, deduplicated);
  return changed || renamed ? 1 : 0;
}
