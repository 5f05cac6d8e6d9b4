import { describe, test, expect, afterEach } from "vitest";
import * as path from "path";
import {
  CONFIG_DEFAULTS,
  DEFAULT_FAMILIES,
  loadConfigFile,
  normalizeConfig,
  validateFamilies,
} from "../../src/core/config-normalizer";
import type { RewriteFamily } from "../../src/core/types";
import {
  createRecordingLogger,
  createWorkspace,
  fatalCode,
  removeWorkspaces,
} from "../test-helpers";

afterEach(() => {
  removeWorkspaces();
});

describe("配置规范化", () => {
  test("未提供任何配置时使用默认值", () => {
    const root = createWorkspace({});
    const config = normalizeConfig({ root });

    expect(config.root).toBe(root);
    expect(config.transitive).toBe(false);
    expect(config.verbose).toBe(false);
    expect(config.dryRun).toBe(false);
    expect(config.include).toBe(CONFIG_DEFAULTS.INCLUDE);
    expect(config.ignore).toEqual([...CONFIG_DEFAULTS.IGNORE]);
    expect(config.families.map((f) => f.name)).toEqual(["strict", "soft"]);
    expect(config.scratchDir).toBeUndefined();
  });

  test("自动读取根目录下的配置文件", () => {
    const root = createWorkspace({
      "assert-migrate.config.json": JSON.stringify({
        dryRun: true,
        include: "src/**/*.ts",
        scratchDir: ".scratch",
      }),
    });
    const config = normalizeConfig({ root });

    expect(config.dryRun).toBe(true);
    expect(config.include).toBe("src/**/*.ts");
    expect(config.scratchDir).toBe(path.join(root, ".scratch"));
  });

  test("调用方选项优先于配置文件", () => {
    const root = createWorkspace({
      "assert-migrate.config.json": JSON.stringify({ dryRun: true, transitive: true }),
    });
    const config = normalizeConfig({ root, dryRun: false });

    expect(config.dryRun).toBe(false);
    expect(config.transitive).toBe(true);
  });

  test("配置文件中的族缺省 contextType 时使用默认值", () => {
    const root = createWorkspace({
      "custom.json": JSON.stringify({
        families: [
          {
            name: "strict-only",
            source: { alias: "req", path: "vendor/require" },
            destination: { alias: "chk", path: "vendor/check" },
          },
        ],
      }),
    });
    const config = normalizeConfig({ root, configFile: "custom.json" });

    expect(config.families).toEqual([
      {
        name: "strict-only",
        source: { alias: "req", path: "vendor/require" },
        destination: { alias: "chk", path: "vendor/check" },
        helper: undefined,
        contextType: { name: "TB", path: "testutil/testing" },
      },
    ]);
  });

  test("使用传入的 logger", () => {
    const root = createWorkspace({});
    const logger = createRecordingLogger();
    expect(normalizeConfig({ root, logger }).logger).toBe(logger);
  });

  describe("错误配置", () => {
    test("指定的配置文件不存在", () => {
      const root = createWorkspace({});
      expect(fatalCode(() => normalizeConfig({ root, configFile: "missing.json" }))).toBe(
        "CONFIG002"
      );
    });

    test("配置文件不是合法 JSON", () => {
      const root = createWorkspace({ "assert-migrate.config.json": "{ dryRun: " });
      expect(fatalCode(() => normalizeConfig({ root }))).toBe("CONFIG003");
    });

    test("字段类型错误", () => {
      const root = createWorkspace({
        "bad.json": JSON.stringify({ dryRun: "yes" }),
      });
      expect(fatalCode(() => loadConfigFile(path.join(root, "bad.json")))).toBe("CONFIG001");
    });

    test("目标路径与源路径相同", () => {
      const families: RewriteFamily[] = [
        {
          ...DEFAULT_FAMILIES[0],
          destination: { alias: "gassert", path: "testify/require" },
        },
      ];
      expect(fatalCode(() => validateFamilies(families))).toBe("CONFIG001");
    });

    test("别名不是合法标识符", () => {
      const families: RewriteFamily[] = [
        { ...DEFAULT_FAMILIES[0], source: { alias: "not-valid", path: "testify/require" } },
      ];
      expect(fatalCode(() => validateFamilies(families))).toBe("CONFIG001");
    });

    test("族名重复", () => {
      expect(fatalCode(() => validateFamilies([DEFAULT_FAMILIES[0], DEFAULT_FAMILIES[0]]))).toBe(
        "CONFIG001"
      );
    });
  });
});
