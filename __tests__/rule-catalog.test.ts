import { describe, test, expect } from "vitest";
import {
  findAmbiguousRules,
  referencesHelper,
  RULE_CATALOG,
  validateRule,
} from "../src/rules/catalog";
import type { SubstitutionRule } from "../src/core/types";

describe("规则目录", () => {
  test("包含全部 15 条规则", () => {
    expect(RULE_CATALOG.map((rule) => rule.name)).toEqual([
      "NoError",
      "NoErrorf",
      "Error",
      "NotNil",
      "NotNilf",
      "Nil",
      "Equal",
      "Equalf",
      "NotEqual",
      "Regexp",
      "Contains",
      "True",
      "False",
      "Truef",
      "Falsef",
    ]);
  });

  test("每条规则都有效", () => {
    expect(RULE_CATALOG.flatMap(validateRule)).toEqual([]);
  });

  test("没有 before 形状重叠的规则", () => {
    expect(findAmbiguousRules(RULE_CATALOG)).toEqual([]);
  });

  test("只有 NotEqual 和 Contains 引用 helper 命名空间", () => {
    const withHelper = RULE_CATALOG.filter((rule) => referencesHelper(rule.after)).map(
      (rule) => rule.name
    );
    expect(withHelper).toEqual(["NotEqual", "Contains"]);
  });

  test("规则对象是冻结的", () => {
    expect(Object.isFrozen(RULE_CATALOG)).toBe(true);
    expect(Object.isFrozen(RULE_CATALOG[0])).toBe(true);
  });

  test("规则的形状和参数槽同样是冻结的", () => {
    const notEqual = RULE_CATALOG.find((rule) => rule.name === "NotEqual");
    if (!notEqual) throw new Error("NotEqual not found");
    const helperArg = notEqual.after.args[2];

    expect(Object.isFrozen(notEqual.before.args)).toBe(true);
    expect(Object.isFrozen(notEqual.before.args[0])).toBe(true);
    expect(Object.isFrozen(notEqual.after.callee)).toBe(true);
    expect(Object.isFrozen(notEqual.signature[1])).toBe(true);
    expect(helperArg.kind).toBe("call");
    if (helperArg.kind === "call") {
      expect(Object.isFrozen(helperArg.call.args)).toBe(true);
    }
    expect(() => {
      notEqual.before.args.push({ kind: "trailing" });
    }).toThrow(TypeError);
    expect(notEqual.before.args).toHaveLength(4);
  });

  test("检测丢参和重复绑定的规则", () => {
    const broken: SubstitutionRule = {
      name: "Broken",
      signature: [
        { name: "t", type: "context" },
        { name: "a", type: "any" },
      ],
      before: {
        callee: { namespace: "source", member: "Broken" },
        args: [
          { kind: "param", name: "t" },
          { kind: "param", name: "t" },
          { kind: "trailing" },
        ],
      },
      after: {
        callee: { namespace: "destination", member: "Broken" },
        args: [
          { kind: "param", name: "t" },
          { kind: "param", name: "a" },
          { kind: "trailing" },
        ],
      },
    };

    expect(validateRule(broken)).toEqual([
      "Broken: before shape binds a parameter twice",
      "Broken: before shape drops a",
    ]);
  });

  test("同一个源成员出现两次视为重叠", () => {
    const duplicate = { ...RULE_CATALOG[0], name: "NoErrorAgain" };
    expect(findAmbiguousRules([RULE_CATALOG[0], duplicate])).toEqual([
      ["NoError", "NoErrorAgain"],
    ]);
  });
});
