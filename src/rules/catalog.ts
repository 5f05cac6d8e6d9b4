/**
 * 规则目录
 * 静态声明每一条断言 API 迁移规则；尾部消息参数由模板展开器按数量变体补齐
 */

import type {
  CallShape,
  NamespaceRole,
  ParamSlot,
  ShapeArg,
  SlotType,
  SubstitutionRule,
} from "../core/types";

function slot(name: string, type: SlotType): ParamSlot {
  return { name, type };
}

const T = slot("t", "context");

const p = (name: string): ShapeArg => ({ kind: "param", name });
const TRAILING: ShapeArg = { kind: "trailing" };

function call(
  namespace: NamespaceRole,
  member: string,
  ...args: ShapeArg[]
): CallShape {
  return { callee: { namespace, member }, args };
}

const src = (member: string, ...args: ShapeArg[]) =>
  call("source", member, ...args);
const dst = (member: string, ...args: ShapeArg[]) =>
  call("destination", member, ...args);
const helper = (member: string, ...args: ShapeArg[]): ShapeArg => ({
  kind: "call",
  call: call("helper", member, ...args),
});

function freezeShape(shape: CallShape): CallShape {
  for (const arg of shape.args) {
    if (arg.kind === "call") freezeShape(arg.call);
    Object.freeze(arg);
  }
  Object.freeze(shape.args);
  Object.freeze(shape.callee);
  return Object.freeze(shape);
}

function rule(
  name: string,
  signature: ParamSlot[],
  before: CallShape,
  after: CallShape
): SubstitutionRule {
  signature.forEach((s) => Object.freeze(s));
  return Object.freeze({
    name,
    signature: Object.freeze(signature),
    before: freezeShape(before),
    after: freezeShape(after),
  });
}

export const RULE_CATALOG: readonly SubstitutionRule[] = Object.freeze([
  rule(
    "NoError",
    [T, slot("err", "error")],
    src("NoError", p("t"), p("err"), TRAILING),
    dst("NoError", p("t"), p("err"), TRAILING)
  ),
  rule(
    "NoErrorf",
    [T, slot("err", "error"), slot("f", "string")],
    src("NoErrorf", p("t"), p("err"), p("f"), TRAILING),
    dst("NoError", p("t"), p("err"), p("f"), TRAILING)
  ),
  rule(
    "Error",
    [T, slot("err", "error")],
    src("Error", p("t"), p("err"), TRAILING),
    dst("NotNil", p("t"), p("err"), TRAILING)
  ),
  rule(
    "NotNil",
    [T, slot("a", "any")],
    src("NotNil", p("t"), p("a"), TRAILING),
    dst("NotNil", p("t"), p("a"), TRAILING)
  ),
  rule(
    "NotNilf",
    [T, slot("a", "any"), slot("f", "string")],
    src("NotNilf", p("t"), p("a"), p("f"), TRAILING),
    dst("NotNil", p("t"), p("a"), p("f"), TRAILING)
  ),
  rule(
    "Nil",
    [T, slot("a", "any")],
    src("Nil", p("t"), p("a"), TRAILING),
    dst("Nil", p("t"), p("a"), TRAILING)
  ),
  // 目标 API 的期望值在前
  rule(
    "Equal",
    [T, slot("a", "any"), slot("b", "any")],
    src("Equal", p("t"), p("a"), p("b"), TRAILING),
    dst("EQ", p("t"), p("b"), p("a"), TRAILING)
  ),
  rule(
    "Equalf",
    [T, slot("a", "any"), slot("b", "any"), slot("f", "string")],
    src("Equalf", p("t"), p("a"), p("b"), p("f"), TRAILING),
    dst("EQ", p("t"), p("b"), p("a"), p("f"), TRAILING)
  ),
  rule(
    "NotEqual",
    [T, slot("a", "any"), slot("b", "any")],
    src("NotEqual", p("t"), p("a"), p("b"), TRAILING),
    dst("That", p("t"), p("a"), helper("NEQ", p("b")), TRAILING)
  ),
  rule(
    "Regexp",
    [T, slot("a", "any"), slot("b", "any")],
    src("Regexp", p("t"), p("a"), p("b"), TRAILING),
    dst("Regexp", p("t"), p("b"), p("a"), TRAILING)
  ),
  rule(
    "Contains",
    [T, slot("a", "any"), slot("b", "any")],
    src("Contains", p("t"), p("a"), p("b"), TRAILING),
    dst("That", p("t"), p("a"), helper("Contains", p("b")), TRAILING)
  ),
  rule(
    "True",
    [T, slot("a", "boolean")],
    src("True", p("t"), p("a"), TRAILING),
    dst("True", p("t"), p("a"), TRAILING)
  ),
  rule(
    "False",
    [T, slot("a", "boolean")],
    src("False", p("t"), p("a"), TRAILING),
    dst("False", p("t"), p("a"), TRAILING)
  ),
  rule(
    "Truef",
    [T, slot("a", "boolean"), slot("f", "string")],
    src("Truef", p("t"), p("a"), p("f"), TRAILING),
    dst("True", p("t"), p("a"), p("f"), TRAILING)
  ),
  rule(
    "Falsef",
    [T, slot("a", "boolean"), slot("f", "string")],
    src("Falsef", p("t"), p("a"), p("f"), TRAILING),
    dst("False", p("t"), p("a"), p("f"), TRAILING)
  ),
]);

function collectParams(shape: CallShape, into: string[] = []): string[] {
  for (const arg of shape.args) {
    if (arg.kind === "param") into.push(arg.name);
    else if (arg.kind === "call") collectParams(arg.call, into);
  }
  return into;
}

function usesNamespace(shape: CallShape, role: NamespaceRole): boolean {
  if (shape.callee.namespace === role) return true;
  return shape.args.some(
    (arg) => arg.kind === "call" && usesNamespace(arg.call, role)
  );
}

export function referencesHelper(shape: CallShape): boolean {
  return usesNamespace(shape, "helper");
}

function trailingIsLast(shape: CallShape): boolean {
  const index = shape.args.findIndex((arg) => arg.kind === "trailing");
  return index === shape.args.length - 1;
}

/**
 * 检查单条规则，返回发现的问题（空数组表示规则有效）
 */
export function validateRule(rule: SubstitutionRule): string[] {
  const problems: string[] = [];
  const declared = rule.signature.map((s) => s.name);
  const declaredSet = new Set(declared);

  if (declaredSet.size !== declared.length) {
    problems.push(`${rule.name}: duplicate parameter names`);
  }
  if (rule.before.callee.namespace !== "source") {
    problems.push(`${rule.name}: before shape must call the source namespace`);
  }
  if (usesNamespace(rule.after, "source")) {
    problems.push(`${rule.name}: after shape references the source namespace`);
  }
  if (!rule.before.args.every((arg) => arg.kind !== "call")) {
    problems.push(`${rule.name}: before arguments must be plain parameters`);
  }
  if (!trailingIsLast(rule.before) || !trailingIsLast(rule.after)) {
    problems.push(`${rule.name}: trailing arguments must come last`);
  }

  const beforeParams = collectParams(rule.before);
  if (new Set(beforeParams).size !== beforeParams.length) {
    problems.push(`${rule.name}: before shape binds a parameter twice`);
  }
  for (const [label, params] of [
    ["before", beforeParams],
    ["after", collectParams(rule.after)],
  ] as const) {
    const used = new Set(params);
    for (const name of declared) {
      if (!used.has(name)) problems.push(`${rule.name}: ${label} shape drops ${name}`);
    }
    for (const name of used) {
      if (!declaredSet.has(name)) problems.push(`${rule.name}: ${label} shape references undeclared ${name}`);
    }
  }
  return problems;
}

/**
 * 找出 before 形状重叠的规则对（同一个源成员由多条规则处理）
 */
export function findAmbiguousRules(
  catalog: readonly SubstitutionRule[]
): Array<[string, string]> {
  const byMember = new Map<string, string>();
  const pairs: Array<[string, string]> = [];
  for (const r of catalog) {
    const member = r.before.callee.member;
    const existing = byMember.get(member);
    if (existing !== undefined) {
      pairs.push([existing, r.name]);
    } else {
      byMember.set(member, r.name);
    }
  }
  return pairs;
}
