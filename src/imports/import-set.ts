/**
 * 规范导入集合
 * 目标文件的导入以 ImportRecord 列表为准，声明列表和输出文本都从它重新生成
 */

import traverse, { NodePath } from "@babel/traverse";
import type { Binding } from "@babel/traverse";
import generate from "@babel/generator";
import * as t from "@babel/types";
import type { ImportRecord, TargetFile } from "../core/types";
import { textReplacement, insertion } from "../core/text-patcher";
import { detectCodeStyle, StringUtils } from "../core/utils";
import type { CodeStyle } from "../core/utils";

/**
 * 取得文件的 Program 路径（带作用域信息）
 */
export function getProgramPath(ast: t.File): NodePath<t.Program> {
  const found: NodePath<t.Program>[] = [];
  traverse(ast, {
    Program(path) {
      found.push(path);
      path.stop();
    },
  });
  if (found.length === 0) {
    throw new Error("File has no program node");
  }
  return found[0];
}

/**
 * 收集文件中所有被引用的标识符名称（包括类型位置的引用）
 */
export function collectReferencedNames(ast: t.File): Set<string> {
  const names = new Set<string>();
  traverse(ast, {
    ReferencedIdentifier(path) {
      names.add(path.node.name);
    },
  });
  return names;
}

/**
 * binding 是否是从 importPath 导入的命名空间
 */
export function isNamespaceImportOf(binding: Binding, importPath: string): boolean {
  if (binding.kind !== "module" || !binding.path.isImportNamespaceSpecifier()) {
    return false;
  }
  const declaration = binding.path.parentPath;
  return (
    declaration !== null &&
    declaration.isImportDeclaration() &&
    declaration.node.source.value === importPath
  );
}

function importedName(specifier: t.ImportSpecifier): string {
  return t.isIdentifier(specifier.imported)
    ? specifier.imported.name
    : specifier.imported.value;
}

/**
 * 从声明列表推导规范导入集合
 */
export function readImportRecords(
  ast: t.File,
  referenced: Set<string> = collectReferencedNames(ast)
): ImportRecord[] {
  const records: ImportRecord[] = [];
  ast.program.body.forEach((statement, declIndex) => {
    if (!t.isImportDeclaration(statement)) return;
    const path = statement.source.value;
    const declTypeOnly = statement.importKind === "type";

    if (statement.specifiers.length === 0) {
      records.push({
        path,
        kind: "side-effect",
        typeOnly: declTypeOnly,
        used: true,
        declIndex,
        specIndex: -1,
      });
      return;
    }

    statement.specifiers.forEach((specifier, specIndex) => {
      const local = specifier.local.name;
      const base = {
        path,
        local,
        used: referenced.has(local),
        declIndex,
        specIndex,
      };
      if (t.isImportNamespaceSpecifier(specifier)) {
        records.push({ ...base, kind: "namespace", typeOnly: declTypeOnly });
      } else if (t.isImportDefaultSpecifier(specifier)) {
        records.push({ ...base, kind: "default", typeOnly: declTypeOnly });
      } else {
        records.push({
          ...base,
          kind: "named",
          imported: importedName(specifier),
          typeOnly: declTypeOnly || specifier.importKind === "type",
        });
      }
    });
  });
  return records;
}

/**
 * 导入集合的可比较描述，忽略位置和使用情况
 */
export function describeImports(records: ImportRecord[]): string[] {
  return records
    .map((record) => {
      const typePrefix = record.typeOnly ? "type " : "";
      const binding =
        record.kind === "named" && record.imported !== record.local
          ? `${record.imported} as ${record.local}`
          : record.local ?? "";
      return `${typePrefix}${record.kind} ${binding} from ${record.path}`.replace(
        /\s+/g,
        " "
      );
    })
    .sort();
}

function locationOf(node: t.Node): { start: number; end: number } {
  if (node.start == null || node.end == null) {
    throw new Error(`${node.type} has no source location`);
  }
  return { start: node.start, end: node.end };
}

/**
 * 按规范集合重建一条已有声明；返回 null 表示整条删除，返回原节点表示未变化
 */
function rebuildDeclaration(
  declaration: t.ImportDeclaration,
  records: ImportRecord[]
): t.ImportDeclaration | null {
  if (declaration.specifiers.length === 0) {
    return records.length > 0 ? declaration : null;
  }
  if (records.length === 0) return null;

  const specifiers = [...records]
    .sort((a, b) => a.specIndex - b.specIndex)
    .flatMap((record) => {
      const original = declaration.specifiers[record.specIndex];
      if (!original) return [];
      if (record.local && original.local.name !== record.local) {
        const renamed = t.cloneNode(original);
        renamed.local = t.identifier(record.local);
        return [renamed];
      }
      return [original];
    });

  const unchanged =
    specifiers.length === declaration.specifiers.length &&
    specifiers.every((spec, i) => spec === declaration.specifiers[i]);
  if (unchanged) return declaration;

  const rebuilt = t.cloneNode(declaration, false);
  rebuilt.specifiers = specifiers;
  return rebuilt;
}

function buildDeclaration(record: ImportRecord, style: CodeStyle): t.ImportDeclaration {
  const source = t.stringLiteral(record.path);
  source.extra = {
    rawValue: record.path,
    raw: StringUtils.quote(record.path, style.quote),
  };

  let specifiers: t.ImportDeclaration["specifiers"] = [];
  if (record.local) {
    const local = t.identifier(record.local);
    switch (record.kind) {
      case "namespace":
        specifiers = [t.importNamespaceSpecifier(local)];
        break;
      case "default":
        specifiers = [t.importDefaultSpecifier(local)];
        break;
      case "named":
        specifiers = [
          t.importSpecifier(local, t.identifier(record.imported ?? record.local)),
        ];
        break;
      case "side-effect":
        break;
    }
  }

  const declaration = t.importDeclaration(specifiers, source);
  if (record.typeOnly) declaration.importKind = "type";
  return declaration;
}

function printDeclaration(declaration: t.ImportDeclaration, semicolon: boolean): string {
  const bare = t.cloneNode(declaration, true, true);
  bare.leadingComments = null;
  bare.trailingComments = null;
  bare.innerComments = null;
  const code = generate(bare).code;
  return semicolon ? code : code.replace(/;$/, "");
}

/**
 * 用规范集合重新生成声明列表，并记录对应的最小文本修改。
 * 未变化的声明保持原样；被改写的声明沿用原来的引号和 import type 修饰；
 * 新增的导入放在最后一条保留的导入之后。
 * 返回是否有任何变化
 */
export function syncImportDeclarations(
  file: TargetFile,
  records: ImportRecord[]
): boolean {
  const code = file.originalCode;
  const style = detectCodeStyle(code, file.ast);
  const byDeclaration = new Map<number, ImportRecord[]>();
  const added: ImportRecord[] = [];
  for (const record of records) {
    if (record.declIndex < 0) {
      added.push(record);
      continue;
    }
    const group = byDeclaration.get(record.declIndex) ?? [];
    group.push(record);
    byDeclaration.set(record.declIndex, group);
  }

  let changed = false;
  const body: t.Statement[] = [];
  let anchor: { index: number; end: number } | undefined;
  let firstRemoved: { index: number; start: number } | undefined;

  for (const [index, statement] of file.ast.program.body.entries()) {
    if (!t.isImportDeclaration(statement)) {
      body.push(statement);
      continue;
    }
    const next = rebuildDeclaration(statement, byDeclaration.get(index) ?? []);
    const range = locationOf(statement);
    if (next === statement) {
      body.push(statement);
      anchor = { index: body.length - 1, end: range.end };
      continue;
    }
    changed = true;
    if (next === null) {
      firstRemoved ??= { index: body.length, start: range.start };
      file.replacements.push(
        textReplacement(range.start, StringUtils.consumeNewline(code, range.end), "")
      );
      continue;
    }
    const semicolon = code[range.end - 1] === ";";
    file.replacements.push(
      textReplacement(range.start, range.end, printDeclaration(next, semicolon))
    );
    body.push(next);
    anchor = { index: body.length - 1, end: range.end };
  }

  if (added.length > 0) {
    changed = true;
    const declarations = added.map((record) => buildDeclaration(record, style));
    const lines = declarations.map((d) => printDeclaration(d, style.semicolon));

    if (anchor) {
      body.splice(anchor.index + 1, 0, ...declarations);
      file.replacements.push(
        insertion(anchor.end, lines.map((line) => `${style.newline}${line}`).join(""))
      );
    } else {
      const at = firstRemoved ?? {
        index: 0,
        start: body.length > 0 ? locationOf(body[0]).start : 0,
      };
      body.splice(at.index, 0, ...declarations);
      file.replacements.push(
        insertion(at.start, `${lines.join(style.newline)}${style.newline}`)
      );
    }
  }

  if (changed) {
    file.ast.program.body = body;
  }
  file.imports = readImportRecords(file.ast);
  return changed;
}
