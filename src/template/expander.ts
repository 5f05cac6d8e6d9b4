/**
 * 模板展开器
 * 把每条规则按 改写族 × 尾部参数数量 展开为可编译的模板单元
 */

import type {
  ArityVariant,
  CallShape,
  ConcreteArg,
  ConcreteCall,
  ModuleBinding,
  ParamSlot,
  RewriteFamily,
  SubstitutionRule,
  TemplateImport,
  TemplateUnit,
} from "../core/types";
import { referencesHelper, findAmbiguousRules, validateRule } from "../rules/catalog";
import { abortWith } from "../core/error-handler";
import { renderTemplateUnit } from "./render";

/**
 * 合成单元名称的保留命名空间。npm 包名不能以 "@@" 开头，因此不会与真实包冲突
 */
export const TEMPLATE_NAMESPACE = "@@template/";

export const MAX_TRAILING_ARGS = 5;

export function templateUnitName(ordinal: number): string {
  return `${TEMPLATE_NAMESPACE}${String(ordinal).padStart(4, "0")}`;
}

export function isTemplateUnitName(name: string): boolean {
  return name.startsWith(TEMPLATE_NAMESPACE);
}

/**
 * 单次运行的展开状态；编号只在本次运行内递增
 */
export interface ExpansionContext {
  nextOrdinal: number;
}

export function createExpansionContext(): ExpansionContext {
  return { nextOrdinal: 0 };
}

function buildArityVariants(max: number): ArityVariant[] {
  const variants: ArityVariant[] = [];
  for (let count = 0; count <= max; count++) {
    const params: ParamSlot[] = [];
    for (let i = 0; i < count; i++) params.push({ name: `m${i}`, type: "any" });
    variants.push(Object.freeze({ count, params: Object.freeze(params) }));
  }
  return variants;
}

export const ARITY_VARIANTS: readonly ArityVariant[] = Object.freeze(
  buildArityVariants(MAX_TRAILING_ARGS)
);

function bindingFor(
  family: RewriteFamily,
  namespace: CallShape["callee"]["namespace"],
  rule: SubstitutionRule
): ModuleBinding {
  switch (namespace) {
    case "source":
      return family.source;
    case "destination":
      return family.destination;
    case "helper":
      if (!family.helper) {
        abortWith("TEMPLATE003", [
          `${rule.name} needs a helper module but family ${family.name} has none`,
        ]);
      }
      return family.helper;
  }
}

function concretize(
  shape: CallShape,
  family: RewriteFamily,
  arity: ArityVariant,
  rule: SubstitutionRule
): ConcreteCall {
  const binding = bindingFor(family, shape.callee.namespace, rule);
  const args: ConcreteArg[] = [];
  for (const arg of shape.args) {
    switch (arg.kind) {
      case "param":
        args.push({ kind: "param", name: arg.name });
        break;
      case "call":
        args.push({ kind: "call", call: concretize(arg.call, family, arity, rule) });
        break;
      case "trailing":
        for (const slot of arity.params) args.push({ kind: "param", name: slot.name });
        break;
    }
  }
  return {
    callee: { alias: binding.alias, path: binding.path, member: shape.callee.member },
    args,
  };
}

function unitImports(rule: SubstitutionRule, family: RewriteFamily): TemplateImport[] {
  const imports: TemplateImport[] = [
    { local: family.contextType.name, path: family.contextType.path, kind: "type" },
    { local: family.source.alias, path: family.source.path, kind: "namespace" },
    { local: family.destination.alias, path: family.destination.path, kind: "namespace" },
  ];
  if (family.helper && referencesHelper(rule.after)) {
    imports.push({ local: family.helper.alias, path: family.helper.path, kind: "namespace" });
  }
  return imports;
}

/**
 * 展开单个 (规则, 族, 数量变体)，消耗一个编号
 */
export function expandRule(
  ctx: ExpansionContext,
  rule: SubstitutionRule,
  family: RewriteFamily,
  arity: ArityVariant
): TemplateUnit {
  const ordinal = ctx.nextOrdinal++;
  const unit: Omit<TemplateUnit, "source"> = {
    name: templateUnitName(ordinal),
    ordinal,
    rule,
    family,
    arity,
    signature: [...rule.signature, ...arity.params],
    before: concretize(rule.before, family, arity, rule),
    after: concretize(rule.after, family, arity, rule),
    imports: unitImports(rule, family),
  };
  return { ...unit, source: renderTemplateUnit(unit) };
}

/**
 * 校验规则目录：每条规则自身有效，且不存在重叠的 before 形状
 */
export function assertValidCatalog(catalog: readonly SubstitutionRule[]): void {
  const problems = catalog.flatMap(validateRule);
  for (const [a, b] of findAmbiguousRules(catalog)) {
    problems.push(`rules ${a} and ${b} match the same call`);
  }
  if (problems.length > 0) {
    abortWith("TEMPLATE003", [problems.join("; ")]);
  }
}

/**
 * 展开整个目录：规则 → 族 → 数量变体
 */
export function expandCatalog(
  ctx: ExpansionContext,
  catalog: readonly SubstitutionRule[],
  families: readonly RewriteFamily[],
  arities: readonly ArityVariant[] = ARITY_VARIANTS
): TemplateUnit[] {
  assertValidCatalog(catalog);
  const units: TemplateUnit[] = [];
  for (const rule of catalog) {
    for (const family of families) {
      for (const arity of arities) {
        units.push(expandRule(ctx, rule, family, arity));
      }
    }
  }
  return units;
}
