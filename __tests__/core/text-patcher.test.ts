import { describe, test, expect } from "vitest";
import {
  applyReplacements,
  insertion,
  textReplacement,
} from "../../src/core/text-patcher";
import type { Replacement } from "../../src/core/text-patcher";

describe("Text Patcher", () => {
  test("没有修改时原样返回", () => {
    const code = "const a = 1;\n";
    expect(applyReplacements(code, [])).toBe(code);
  });

  test("只替换指定区间，其余字节保持不变", () => {
    expect(applyReplacements("abcdef", [textReplacement(1, 3, "XY")])).toBe(
      "aXYdef"
    );
  });

  test("同一位置的插入排在删除之前", () => {
    const code = "import a;\nrest";
    const result = applyReplacements(code, [
      textReplacement(0, 10, ""),
      insertion(0, "import b;\n"),
    ]);
    expect(result).toBe("import b;\nrest");
  });

  test("同一位置的多个插入保持登记顺序", () => {
    const result = applyReplacements("x", [insertion(1, "1"), insertion(1, "2")]);
    expect(result).toBe("x12");
  });

  test("外层替换通过区间片段引用内层已修改的文本", () => {
    const code = "f(g(x), y)";
    const inner: Replacement = { start: 2, end: 6, parts: ["G(", { start: 4, end: 5 }, ")"] };
    const outer: Replacement = {
      start: 0,
      end: 10,
      parts: ["F(", { start: 8, end: 9 }, ", ", { start: 2, end: 6 }, ")"],
    };

    expect(applyReplacements(code, [inner, outer])).toBe("F(y, G(x))");
    expect(applyReplacements(code, [outer, inner])).toBe("F(y, G(x))");
  });

  test("部分重叠的替换会抛出错误", () => {
    expect(() =>
      applyReplacements("0123456789", [
        textReplacement(0, 5, "a"),
        textReplacement(3, 8, "b"),
      ])
    ).toThrow(/Overlapping replacements/);
  });
});
