import { describe, test, expect, afterEach } from "vitest";
import * as path from "path";
import {
  collectImportSpecifiers,
  discoverPackages,
  resolvePackageSet,
} from "../../src/workspace/packages";
import { CONFIG_DEFAULTS } from "../../src/core/config-normalizer";
import { createWorkspace, fatalCode, manifest, removeWorkspaces } from "../test-helpers";

const discoverOptions = {
  include: CONFIG_DEFAULTS.INCLUDE,
  ignore: [...CONFIG_DEFAULTS.IGNORE],
};

afterEach(() => {
  removeWorkspaces();
});

function chainWorkspace(): string {
  return createWorkspace({
    "packages/p/package.json": manifest("p"),
    "packages/p/util.ts": "export const one = 1;\n",
    "packages/q/package.json": manifest("q"),
    "packages/q/q.test.ts": 'import { one } from "p/util";\nexport const two = one + 1;\n',
    "packages/r/package.json": manifest("r", { q: "1.0.0" }),
    "packages/r/r.ts": "export const three = 3;\n",
    "packages/s/package.json": manifest("s"),
    "packages/s/s.ts": 'import lodash from "lodash";\nexport default lodash;\n',
  });
}

describe("工作区包发现", () => {
  test("每个包只包含自己的源文件", () => {
    const root = createWorkspace({
      "packages/a/package.json": manifest("a", { b: "1.0.0" }),
      "packages/a/src/a.test.ts": "export {};\n",
      "packages/a/src/types.d.ts": "export {};\n",
      "packages/a/dist/a.js": "export {};\n",
      "packages/a/node_modules/dep/package.json": manifest("dep"),
      "packages/a/node_modules/dep/index.js": "export {};\n",
      "packages/a/README.md": "# a\n",
      "packages/a/sub/package.json": manifest("a-sub"),
      "packages/a/sub/s.ts": "export {};\n",
    });
    const packages = discoverPackages(root, discoverOptions);

    expect(packages.map((p) => p.name)).toEqual(["a", "a-sub"]);
    expect(packages[0].dir).toBe(path.join(root, "packages/a"));
    expect(packages[0].files).toEqual([path.join(root, "packages/a/src/a.test.ts")]);
    expect(packages[0].dependencies).toEqual(["b"]);
    expect(packages[1].files).toEqual([path.join(root, "packages/a/sub/s.ts")]);
  });

  test("没有 name 的包以相对目录命名", () => {
    const root = createWorkspace({
      "tools/package.json": JSON.stringify({ private: true }),
    });
    expect(discoverPackages(root, discoverOptions).map((p) => p.name)).toEqual(["tools"]);
  });

  test("无法解析的清单是 LOAD003", () => {
    const root = createWorkspace({ "bad/package.json": "{" });
    expect(fatalCode(() => discoverPackages(root, discoverOptions))).toBe("LOAD003");
  });

  test("收集裸模块说明符", () => {
    const root = createWorkspace({
      "pkg/package.json": manifest("pkg"),
      "pkg/index.ts": [
        'import "side-effect";',
        'import { a } from "./local";',
        'export * from "re-export";',
        'const lazy = import("lazy/sub");',
        'const req = require("required");',
        "",
      ].join("\n"),
    });
    const [pkg] = discoverPackages(root, discoverOptions);

    expect([...collectImportSpecifiers(pkg)].sort()).toEqual([
      "lazy/sub",
      "re-export",
      "required",
      "side-effect",
    ]);
  });
});

describe("包选择", () => {
  test("按名称、名称 glob、目录和目录 glob 选择", () => {
    const root = createWorkspace({
      "packages/a/package.json": manifest("@scope/a"),
      "packages/b/package.json": manifest("@scope/b"),
      "tools/c/package.json": manifest("c"),
    });
    const all = discoverPackages(root, discoverOptions);
    const names = (patterns: string[]) =>
      resolvePackageSet(all, patterns, { root, transitive: false }).map((p) => p.name);

    expect(names(["c"])).toEqual(["c"]);
    expect(names(["@scope/*"])).toEqual(["@scope/a", "@scope/b"]);
    expect(names(["./tools/c"])).toEqual(["c"]);
    expect(names(["packages/*"])).toEqual(["@scope/a", "@scope/b"]);
    expect(names([path.join(root, "packages/b")])).toEqual(["@scope/b"]);
  });

  test("没有匹配到包的参数是 LOAD002", () => {
    const root = createWorkspace({ "a/package.json": manifest("a") });
    const all = discoverPackages(root, discoverOptions);

    expect(fatalCode(() => resolvePackageSet(all, ["a", "missing"], { root, transitive: false }))).toBe(
      "LOAD002"
    );
    expect(fatalCode(() => resolvePackageSet(all, [], { root, transitive: false }))).toBe("LOAD002");
  });

  test("非传递模式只选中参数匹配的包", () => {
    const root = chainWorkspace();
    const all = discoverPackages(root, discoverOptions);

    expect(resolvePackageSet(all, ["p"], { root, transitive: false }).map((p) => p.name)).toEqual(["p"]);
  });

  test("传递模式加入所有直接或间接依赖者", () => {
    const root = chainWorkspace();
    const all = discoverPackages(root, discoverOptions);

    expect(resolvePackageSet(all, ["p"], { root, transitive: true }).map((p) => p.name)).toEqual([
      "p",
      "q",
      "r",
    ]);
  });
});
