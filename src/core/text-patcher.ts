/**
 * Text Patcher
 * 以最小化方式应用文本替换，未触及的字节保持原样。
 * 替换可以嵌套：外层替换通过区间片段引用原文，落在该区间内的内层替换会在渲染时一并应用。
 */

/** 片段：字面文本，或原文中的一个区间 */
export type ReplacementPart = string | { start: number; end: number };

export interface Replacement {
  start: number;
  end: number;
  parts: ReplacementPart[];
}

export function textReplacement(
  start: number,
  end: number,
  text: string
): Replacement {
  return { start, end, parts: [text] };
}

export function insertion(at: number, text: string): Replacement {
  return { start: at, end: at, parts: [text] };
}

export function applyReplacements(
  code: string,
  replacements: Replacement[]
): string {
  if (!replacements.length) return code;
  return renderRange(code, 0, code.length, replacements);
}

interface Group {
  replacement: Replacement;
  nested: Replacement[];
}

// 同一起点：插入优先，其次是覆盖范围更大的替换
function compareReplacements(a: Replacement, b: Replacement): number {
  if (a.start !== b.start) return a.start - b.start;
  const aEmpty = a.start === a.end;
  const bEmpty = b.start === b.end;
  if (aEmpty !== bEmpty) return aEmpty ? -1 : 1;
  return b.end - a.end;
}

function renderRange(
  code: string,
  from: number,
  to: number,
  replacements: Replacement[]
): string {
  // sort 是稳定的，同位置的插入保持登记顺序
  const ordered = [...replacements].sort(compareReplacements);
  const groups: Group[] = [];
  let cursor = from;

  for (const r of ordered) {
    const current = groups[groups.length - 1];
    if (current && r.start < cursor) {
      if (r.end > current.replacement.end) {
        throw new Error(
          `Overlapping replacements at ${r.start}-${r.end} and ${current.replacement.start}-${current.replacement.end}`
        );
      }
      current.nested.push(r);
      continue;
    }
    groups.push({ replacement: r, nested: [] });
    cursor = r.end;
  }

  let out = "";
  cursor = from;
  for (const { replacement, nested } of groups) {
    out += code.slice(cursor, replacement.start);
    for (const part of replacement.parts) {
      if (typeof part === "string") {
        out += part;
        continue;
      }
      const inner = nested.filter(
        (n) => n.start >= part.start && n.end <= part.end
      );
      out += renderRange(code, part.start, part.end, inner);
    }
    cursor = replacement.end;
  }
  out += code.slice(cursor, to);
  return out;
}
