/**
 * 模板单元分析
 * 从单元源码中取出 before / after 两个调用，校验它们可以作为改写模式使用
 */

import * as t from "@babel/types";
import type { ModuleBinding, ParamSlot, SlotType, UnitHandle } from "../core/types";
import { ASTParserUtils } from "../core/utils";
import { abortWith } from "../core/error-handler";

export interface BeforePattern {
  /** before 调用的被调用者所属模块 */
  path: string;
  member: string;
  /** 每个实参位置对应的参数槽 */
  slots: ParamSlot[];
}

export interface AnalyzedUnit {
  handle: UnitHandle;
  ast: t.File;
  signature: ParamSlot[];
  before: BeforePattern;
  after: t.CallExpression;
  /** after 调用引用的命名空间导入 */
  afterNamespaces: ModuleBinding[];
}

class InvalidUnitError extends Error {}

function invalid(message: string): never {
  throw new InvalidUnitError(message);
}

function slotTypeOf(annotation: t.Identifier["typeAnnotation"]): SlotType {
  if (!t.isTSTypeAnnotation(annotation)) return "any";
  const type = annotation.typeAnnotation;
  if (t.isTSBooleanKeyword(type)) return "boolean";
  if (t.isTSStringKeyword(type)) return "string";
  if (t.isTSTypeReference(type)) return "context";
  return "any";
}

function signatureOf(fn: t.FunctionDeclaration): ParamSlot[] {
  return fn.params.map((param) => {
    if (!t.isIdentifier(param)) {
      invalid(`${fn.id?.name ?? "function"} has a non-identifier parameter`);
    }
    return { name: param.name, type: slotTypeOf(param.typeAnnotation) };
  });
}

function sameSignature(a: ParamSlot[], b: ParamSlot[]): boolean {
  return a.length === b.length && a.every((slot, i) => slot.name === b[i].name && slot.type === b[i].type);
}

function singleCall(fn: t.FunctionDeclaration): t.CallExpression {
  const body = fn.body.body;
  const [statement] = body;
  if (body.length !== 1 || !t.isExpressionStatement(statement) || !t.isCallExpression(statement.expression)) {
    invalid(`${fn.id?.name ?? "function"} body must be a single call`);
  }
  return statement.expression;
}

function namespaceCallee(call: t.CallExpression, namespaces: Map<string, string>): ModuleBinding & { member: string } {
  const callee = call.callee;
  if (
    !t.isMemberExpression(callee) ||
    callee.computed ||
    !t.isIdentifier(callee.object) ||
    !t.isIdentifier(callee.property)
  ) {
    invalid("callee must be <namespace>.<member>");
  }
  const importPath = namespaces.get(callee.object.name);
  if (!importPath) {
    invalid(`${callee.object.name} is not an imported namespace`);
  }
  return { alias: callee.object.name, path: importPath, member: callee.property.name };
}

/**
 * 检查 after 调用只引用 before 绑定过的参数和已导入的命名空间
 */
function checkAfter(
  call: t.CallExpression,
  bound: Set<string>,
  namespaces: Map<string, string>,
  used: Map<string, ModuleBinding>
): void {
  const callee = namespaceCallee(call, namespaces);
  used.set(callee.alias, { alias: callee.alias, path: callee.path });
  for (const arg of call.arguments) {
    if (t.isIdentifier(arg)) {
      if (!bound.has(arg.name)) invalid(`after references ${arg.name}, which before does not bind`);
    } else if (t.isCallExpression(arg)) {
      checkAfter(arg, bound, namespaces, used);
    } else {
      invalid(`after has an unsupported ${arg.type} argument`);
    }
  }
}

function analyze(handle: UnitHandle): AnalyzedUnit {
  const ast = ASTParserUtils.parseCode(handle.source, handle.filePath ?? "unit.ts");

  const namespaces = new Map<string, string>();
  const functions = new Map<string, t.FunctionDeclaration[]>();
  for (const statement of ast.program.body) {
    if (t.isImportDeclaration(statement)) {
      for (const spec of statement.specifiers) {
        if (t.isImportNamespaceSpecifier(spec)) namespaces.set(spec.local.name, statement.source.value);
      }
      continue;
    }
    const declaration = t.isExportNamedDeclaration(statement) ? statement.declaration : statement;
    if (t.isFunctionDeclaration(declaration) && declaration.id) {
      const list = functions.get(declaration.id.name) ?? [];
      list.push(declaration);
      functions.set(declaration.id.name, list);
    }
  }

  const beforeFns = functions.get("before") ?? [];
  const afterFns = functions.get("after") ?? [];
  if (beforeFns.length !== 1 || afterFns.length !== 1) {
    invalid("expected exactly one before and one after function");
  }
  const signature = signatureOf(beforeFns[0]);
  if (!sameSignature(signature, signatureOf(afterFns[0]))) {
    invalid("before and after signatures differ");
  }
  const slots = new Map(signature.map((slot) => [slot.name, slot]));

  const beforeCall = singleCall(beforeFns[0]);
  const beforeCallee = namespaceCallee(beforeCall, namespaces);
  const bound = new Set<string>();
  const beforeSlots = beforeCall.arguments.map((arg) => {
    if (!t.isIdentifier(arg)) invalid("before arguments must be parameters");
    const slot = slots.get(arg.name);
    if (!slot) invalid(`before references ${arg.name}, which is not a parameter`);
    if (bound.has(arg.name)) invalid(`before uses ${arg.name} twice`);
    bound.add(arg.name);
    return slot;
  });

  const after = singleCall(afterFns[0]);
  const used = new Map<string, ModuleBinding>();
  checkAfter(after, bound, namespaces, used);

  return {
    handle,
    ast,
    signature,
    before: { path: beforeCallee.path, member: beforeCallee.member, slots: beforeSlots },
    after,
    afterNamespaces: [...used.values()],
  };
}

/**
 * 解析并校验模板单元；任何问题都是致命的 LOAD004
 */
export function analyzeUnit(handle: UnitHandle): AnalyzedUnit {
  try {
    return analyze(handle);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    abortWith("LOAD004", [handle.name, message], {
      filePath: handle.filePath,
      originalError: error instanceof Error && !(error instanceof InvalidUnitError) ? error : undefined,
    });
  }
}
