import { describe, test, expect, beforeAll } from "vitest";
import { BabelRewriteEngine, renderTargetFile } from "../../src/engine/babel-engine";
import type { BabelProgramImage } from "../../src/engine/babel-engine";
import { createExpansionContext, expandCatalog } from "../../src/template/expander";
import { registerTemplateUnits } from "../../src/template/register";
import { RULE_CATALOG } from "../../src/rules/catalog";
import { DEFAULT_FAMILIES } from "../../src/core/config-normalizer";
import type { Matcher } from "../../src/core/types";
import { fatalCode, targetFromCode } from "../test-helpers";

let engine: BabelRewriteEngine;
let program: BabelProgramImage;
let matchers: Matcher[];

beforeAll(() => {
  engine = new BabelRewriteEngine();
  const units = expandCatalog(createExpansionContext(), RULE_CATALOG, DEFAULT_FAMILIES);
  const handles = registerTemplateUnits(units, engine);
  program = engine.loadProgram([], handles);
  matchers = handles.map((handle) => engine.makeMatcher(program, handle));
});

function rewrite(code: string) {
  const file = targetFromCode(code);
  const count = matchers.reduce((sum, matcher) => sum + matcher.apply(file), 0);
  return { file, count, text: renderTargetFile(file) };
}

const STRICT = 'import * as must from "testify/require";\n';

describe("Babel 改写引擎", () => {
  describe("程序加载", () => {
    test("模板单元作为合成包排在前面", () => {
      expect(program.packages).toHaveLength(180);
      expect(program.packages[0].name).toBe("@@template/0000");
      expect(program.units.size).toBe(180);
    });

    test("重复注册同名单元是致命错误", () => {
      const fresh = new BabelRewriteEngine();
      const [unit] = expandCatalog(createExpansionContext(), RULE_CATALOG, DEFAULT_FAMILIES);
      expect(fatalCode(() => registerTemplateUnits([unit, unit], fresh))).toBe("TEMPLATE002");
    });

    test("签名不一致的单元无法加载", () => {
      const fresh = new BabelRewriteEngine();
      const handle = fresh.registerUnit(
        "@@template/bad",
        [
          'import * as must from "testify/require";',
          'import * as gassert from "testutil/assert";',
          "export function before(t: unknown, a: unknown): void { must.Nil(t, a); }",
          "export function after(t: unknown): void { gassert.Nil(t); }",
        ].join("\n")
      );
      expect(fatalCode(() => fresh.loadProgram([], [handle]))).toBe("LOAD004");
    });

    test("after 引用未导入的命名空间时无法加载", () => {
      const fresh = new BabelRewriteEngine();
      const handle = fresh.registerUnit(
        "@@template/bad",
        [
          'import * as must from "testify/require";',
          "export function before(t: unknown, a: unknown): void { must.Nil(t, a); }",
          "export function after(t: unknown, a: unknown): void { other.Nil(t, a); }",
        ].join("\n")
      );
      expect(fatalCode(() => fresh.loadProgram([], [handle]))).toBe("LOAD004");
    });

    test("目标文件语法错误是 LOAD001", () => {
      expect(fatalCode(() => targetFromCode("const = ;"))).toBe("LOAD001");
    });
  });

  describe("调用匹配", () => {
    test("Equal 交换实参顺序", () => {
      const { count, text } = rewrite(`${STRICT}must.Equal(t, got, want);\n`);
      expect(count).toBe(1);
      expect(text).toBe(`${STRICT}gassert.EQ(t, want, got);\n`);
    });

    test("尾部消息参数原样保留", () => {
      const { count, text } = rewrite(`${STRICT}must.Equal(t, got, want, "case %d", i);\n`);
      expect(count).toBe(1);
      expect(text).toBe(`${STRICT}gassert.EQ(t, want, got, "case %d", i);\n`);
    });

    test("超过 5 个尾部参数不匹配", () => {
      const code = `${STRICT}must.Nil(t, x, 1, 2, 3, 4, 5, 6);\n`;
      expect(rewrite(code).count).toBe(0);
    });

    test("NotEqual 改写为 That 加 helper", () => {
      const code = 'import * as assert from "testify/assert";\nassert.NotEqual(t, a, b);\n';
      const { file, text } = rewrite(code);
      expect(text).toBe('import * as assert from "testify/assert";\ngexpect.That(t, a, h.NEQ(b));\n');
      expect(file.imports.filter((r) => r.declIndex < 0).map((r) => `${r.local}=${r.path}`)).toEqual([
        "gexpect=testutil/expect",
        "h=testutil/h",
      ]);
    });

    test("按名导入的成员同样匹配", () => {
      const code = 'import { NoError } from "testify/require";\nNoError(t, err);\n';
      expect(rewrite(code).text).toBe('import { NoError } from "testify/require";\ngassert.NoError(t, err);\n');
    });

    test("boolean 参数拒绝字符串字面量", () => {
      const code = `${STRICT}must.True(t, "yes");\nmust.True(t, ok);\n`;
      const { count, text } = rewrite(code);
      expect(count).toBe(1);
      expect(text).toBe(`${STRICT}must.True(t, "yes");\ngassert.True(t, ok);\n`);
    });

    test("string 参数拒绝数字字面量", () => {
      const code = `${STRICT}must.NoErrorf(t, err, 42);\n`;
      expect(rewrite(code).count).toBe(0);
    });

    test("展开参数不匹配", () => {
      const code = `${STRICT}must.Equal(t, a, ...rest);\n`;
      expect(rewrite(code).count).toBe(0);
    });

    test("局部变量遮蔽导入时不匹配", () => {
      const code = `${STRICT}function f(must: any) {\n  must.Equal(t, a, b);\n}\n`;
      expect(rewrite(code).count).toBe(0);
    });

    test("其他模块的同名成员不匹配", () => {
      const code = 'import * as must from "other/lib";\nmust.Equal(t, a, b);\n';
      expect(rewrite(code).count).toBe(0);
    });

    test("带括号的实参保留括号", () => {
      const { text } = rewrite(`${STRICT}must.Equal(t, (a + b), c);\n`);
      expect(text).toBe(`${STRICT}gassert.EQ(t, c, (a + b));\n`);
    });

    test("实参中嵌套的调用也会被改写", () => {
      const code = `${STRICT}must.NoError(t, run(() => {\n  must.True(t, ok);\n}));\n`;
      const { count, text } = rewrite(code);
      expect(count).toBe(2);
      expect(text).toBe(`${STRICT}gassert.NoError(t, run(() => {\n  gassert.True(t, ok);\n}));\n`);
    });

    test("目标别名被顶层变量占用时不改写", () => {
      const code = `${STRICT}const gassert = 1;\nmust.Equal(t, a, b);\n`;
      const { count, text, file } = rewrite(code);
      expect(count).toBe(0);
      expect(text).toBe(code);
      expect(file.imports.filter((r) => r.declIndex < 0)).toEqual([]);
    });

    test("目标别名被函数参数遮蔽时只改写作用域外的调用", () => {
      const code = `${STRICT}function check(gassert: unknown) {\n  must.Equal(t, a, b);\n}\nmust.Nil(t, x);\n`;
      const { count, text } = rewrite(code);
      expect(count).toBe(1);
      expect(text).toBe(
        `${STRICT}function check(gassert: unknown) {\n  must.Equal(t, a, b);\n}\ngassert.Nil(t, x);\n`
      );
    });

    test("源模块以目标别名导入时不改写", () => {
      const code = 'import * as gassert from "testify/require";\ngassert.Equal(t, a, b);\n';
      const { count, text } = rewrite(code);
      expect(count).toBe(0);
      expect(text).toBe(code);
    });

    test("目标别名已是目标模块的命名空间导入时照常改写", () => {
      const code = `${STRICT}import * as gassert from "testutil/assert";\nmust.Nil(t, x);\n`;
      const { count, text, file } = rewrite(code);
      expect(count).toBe(1);
      expect(text).toBe(`${STRICT}import * as gassert from "testutil/assert";\ngassert.Nil(t, x);\n`);
      expect(file.imports.filter((r) => r.declIndex < 0)).toEqual([]);
    });

    test("没有匹配时文本不变", () => {
      const code = `${STRICT}const value = compute();\n`;
      const { count, text, file } = rewrite(code);
      expect(count).toBe(0);
      expect(text).toBe(code);
      expect(file.replacements).toEqual([]);
    });
  });
});
