/**
 * 调用匹配与改写
 * 在目标文件中查找与 before 模式一致的调用，替换为实例化后的 after 调用
 */

import traverse, { NodePath } from "@babel/traverse";
import * as t from "@babel/types";
import type { ImportRecord, ModuleBinding, SlotType, TargetFile } from "../core/types";
import type { ReplacementPart } from "../core/text-patcher";
import type { AnalyzedUnit, BeforePattern } from "./unit-analyzer";
import { isNamespaceImportOf } from "../imports/import-set";

interface Range {
  start: number;
  end: number;
}

/**
 * 被替换掉的调用节点在原文中的位置。
 * 外层调用的实参可能已经被内层改写替换，此时通过它找回原文区间
 */
const originalRanges = new WeakMap<t.Node, Range>();

/** 各参数槽拒绝的字面量节点类型 */
const REFUSED_LITERALS: Record<SlotType, ReadonlySet<string>> = {
  context: new Set([
    "StringLiteral",
    "NumericLiteral",
    "BooleanLiteral",
    "NullLiteral",
    "TemplateLiteral",
    "ObjectExpression",
    "ArrayExpression",
    "FunctionExpression",
    "ArrowFunctionExpression",
    "RegExpLiteral",
    "BigIntLiteral",
  ]),
  boolean: new Set([
    "StringLiteral",
    "NumericLiteral",
    "NullLiteral",
    "TemplateLiteral",
    "ObjectExpression",
    "ArrayExpression",
    "FunctionExpression",
    "ArrowFunctionExpression",
    "RegExpLiteral",
    "BigIntLiteral",
  ]),
  string: new Set([
    "NumericLiteral",
    "BooleanLiteral",
    "NullLiteral",
    "ObjectExpression",
    "ArrayExpression",
    "FunctionExpression",
    "ArrowFunctionExpression",
    "RegExpLiteral",
    "BigIntLiteral",
  ]),
  error: new Set(),
  any: new Set(),
};

export function isCompatible(arg: t.Expression, type: SlotType): boolean {
  return !REFUSED_LITERALS[type].has(arg.type);
}

function importSourceOf(path: NodePath): string | undefined {
  const declaration = path.parentPath;
  if (declaration && declaration.isImportDeclaration()) {
    return declaration.node.source.value;
  }
  return undefined;
}

/**
 * 被调用者是否解析到 before 模式的模块成员：
 * 命名空间 / 默认导入再取成员，或直接按名导入该成员
 */
export function calleeMatches(path: NodePath<t.CallExpression>, pattern: BeforePattern): boolean {
  const callee = path.node.callee;

  if (
    t.isMemberExpression(callee) &&
    !callee.computed &&
    t.isIdentifier(callee.object) &&
    t.isIdentifier(callee.property, { name: pattern.member })
  ) {
    const binding = path.scope.getBinding(callee.object.name);
    if (binding?.kind !== "module") return false;
    const spec = binding.path;
    return (
      (spec.isImportNamespaceSpecifier() || spec.isImportDefaultSpecifier()) &&
      importSourceOf(spec) === pattern.path
    );
  }

  if (t.isIdentifier(callee)) {
    const binding = path.scope.getBinding(callee.name);
    if (binding?.kind !== "module") return false;
    const spec = binding.path;
    if (!spec.isImportSpecifier()) return false;
    const imported = spec.node.imported;
    const importedName = t.isIdentifier(imported) ? imported.name : imported.value;
    return importedName === pattern.member && importSourceOf(spec) === pattern.path;
  }

  return false;
}

/**
 * 按参数槽绑定实参；数量不符、展开参数或类型不兼容时返回 undefined
 */
function bindArguments(
  call: t.CallExpression,
  pattern: BeforePattern
): Map<string, t.Expression> | undefined {
  if (call.arguments.length !== pattern.slots.length) return undefined;
  const bound = new Map<string, t.Expression>();
  for (const [i, arg] of call.arguments.entries()) {
    const slot = pattern.slots[i];
    if (!t.isExpression(arg) || !isCompatible(arg, slot.type)) return undefined;
    bound.set(slot.name, arg);
  }
  return bound;
}

function rangeOf(node: t.Node): Range {
  if (node.start != null && node.end != null) {
    return { start: node.start, end: node.end };
  }
  const recorded = originalRanges.get(node);
  if (!recorded) {
    throw new Error(`${node.type} has no source range`);
  }
  return recorded;
}

function calleeText(call: t.CallExpression): string {
  const callee = call.callee;
  if (t.isMemberExpression(callee) && t.isIdentifier(callee.object) && t.isIdentifier(callee.property)) {
    return `${callee.object.name}.${callee.property.name}`;
  }
  throw new Error("after callee must be <namespace>.<member>");
}

/**
 * 实例化 after 模板：同时产出新的 AST 节点和引用原文区间的文本片段
 */
function instantiate(
  template: t.CallExpression,
  bound: Map<string, t.Expression>,
  taken: Set<string>
): { node: t.CallExpression; parts: ReplacementPart[] } {
  const args: t.Expression[] = [];
  const parts: ReplacementPart[] = [`${calleeText(template)}(`];

  template.arguments.forEach((arg, i) => {
    if (i > 0) parts.push(", ");
    if (t.isIdentifier(arg)) {
      const actual = bound.get(arg.name);
      if (!actual) throw new Error(`${arg.name} is not bound`);
      // 同一实参出现多次时，AST 中使用副本
      args.push(taken.has(arg.name) ? t.cloneNode(actual, true) : actual);
      taken.add(arg.name);
      const range = rangeOf(actual);
      if (actual.extra?.parenthesized === true) {
        parts.push("(", range, ")");
      } else {
        parts.push(range);
      }
      return;
    }
    if (t.isCallExpression(arg)) {
      const nested = instantiate(arg, bound, taken);
      args.push(nested.node);
      parts.push(...nested.parts);
      return;
    }
    throw new Error(`unsupported ${arg.type} in after`);
  });

  parts.push(")");
  const node = t.callExpression(t.cloneNode(template.callee, true, true), args);
  return { node, parts };
}

/**
 * after 调用引用的每个别名在调用处都必须可用：未绑定，或已是对应路径的命名空间导入
 */
function aliasesAvailable(path: NodePath, namespaces: ModuleBinding[]): boolean {
  return namespaces.every((namespace) => {
    const binding = path.scope.getBinding(namespace.alias);
    return !binding || isNamespaceImportOf(binding, namespace.path);
  });
}

function ensureNamespaceImports(file: TargetFile, unit: AnalyzedUnit): void {
  for (const binding of unit.afterNamespaces) {
    const present = file.imports.some(
      (record) => record.kind === "namespace" && !record.typeOnly && record.path === binding.path
    );
    if (present) continue;
    const record: ImportRecord = {
      path: binding.path,
      kind: "namespace",
      local: binding.alias,
      typeOnly: false,
      used: true,
      declIndex: -1,
      specIndex: -1,
    };
    file.imports.push(record);
  }
}

/**
 * 在文件中应用一个模板单元，返回改写次数
 */
export function matchUnit(unit: AnalyzedUnit, file: TargetFile): number {
  let count = 0;
  traverse(file.ast, {
    CallExpression: {
      // 后序遍历：内层调用先被改写，外层再通过片段引用它们
      exit(path) {
        if (!calleeMatches(path, unit.before)) return;
        if (!aliasesAvailable(path, unit.afterNamespaces)) return;
        const bound = bindArguments(path.node, unit.before);
        if (!bound) return;

        const range = rangeOf(path.node);
        const { node, parts } = instantiate(unit.after, bound, new Set());
        originalRanges.set(node, range);
        file.replacements.push({ ...range, parts });
        path.replaceWith(node);
        ensureNamespaceImports(file, unit);
        count++;
      },
    },
  });
  return count;
}
