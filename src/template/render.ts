import * as t from "@babel/types";
import generate from "@babel/generator";
import type {
  ConcreteArg,
  ConcreteCall,
  ParamSlot,
  TemplateImport,
  TemplateUnit,
  TypeImport,
} from "../core/types";

function slotType(slot: ParamSlot, contextType: TypeImport): t.TSType {
  switch (slot.type) {
    case "context":
      return t.tsTypeReference(t.identifier(contextType.name));
    case "boolean":
      return t.tsBooleanKeyword();
    case "string":
      return t.tsStringKeyword();
    case "error":
    case "any":
      return t.tsUnknownKeyword();
  }
}

function buildParams(signature: ParamSlot[], contextType: TypeImport): t.Identifier[] {
  return signature.map((slot) => {
    const id = t.identifier(slot.name);
    id.typeAnnotation = t.tsTypeAnnotation(slotType(slot, contextType));
    return id;
  });
}

function buildArg(arg: ConcreteArg): t.Expression {
  return arg.kind === "param" ? t.identifier(arg.name) : buildCall(arg.call);
}

function buildCall(call: ConcreteCall): t.CallExpression {
  return t.callExpression(
    t.memberExpression(t.identifier(call.callee.alias), t.identifier(call.callee.member)),
    call.args.map(buildArg)
  );
}

function buildImport(spec: TemplateImport): t.ImportDeclaration {
  const local = t.identifier(spec.local);
  if (spec.kind === "type") {
    const decl = t.importDeclaration([t.importSpecifier(local, t.identifier(spec.local))], t.stringLiteral(spec.path));
    decl.importKind = "type";
    return decl;
  }
  return t.importDeclaration([t.importNamespaceSpecifier(local)], t.stringLiteral(spec.path));
}

function buildFunction(
  name: "before" | "after",
  unit: Omit<TemplateUnit, "source">,
  call: ConcreteCall
): t.ExportNamedDeclaration {
  const fn = t.functionDeclaration(
    t.identifier(name),
    buildParams(unit.signature, unit.family.contextType),
    t.blockStatement([t.expressionStatement(buildCall(call))])
  );
  fn.returnType = t.tsTypeAnnotation(t.tsVoidKeyword());
  return t.exportNamedDeclaration(fn, []);
}

/**
 * 把结构化的模板单元渲染成 TypeScript 源码，交给改写引擎
 */
export function renderTemplateUnit(unit: Omit<TemplateUnit, "source">): string {
  const body: t.Statement[] = [
    ...unit.imports.map(buildImport),
    buildFunction("before", unit, unit.before),
    buildFunction("after", unit, unit.after),
  ];
  t.addComment(
    body[0],
    "leading",
    ` ${unit.name}: ${unit.rule.name} (${unit.family.name}, ${unit.arity.count} trailing)`,
    true
  );
  return generate(t.file(t.program(body))).code + "\n";
}
