import fs from "fs";
import os from "os";
import path from "path";
import type { RewriteEngine, TemplateUnit, UnitHandle } from "../core/types";
import { abortWith, FatalMigrationError } from "../core/error-handler";

/**
 * 在临时目录中执行 fn，无论成功还是失败都会删除该目录
 */
export async function withScratchDir<T>(
  parent: string | undefined,
  fn: (dir: string) => Promise<T> | T
): Promise<T> {
  const base = parent ?? os.tmpdir();
  let dir: string;
  try {
    fs.mkdirSync(base, { recursive: true });
    dir = fs.mkdtempSync(path.join(base, "assert-migrate-"));
  } catch (error) {
    abortWith("TEMPLATE001", [base, base], {
      originalError: error instanceof Error ? error : undefined,
    });
  }
  try {
    return await fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export function unitFileName(unit: TemplateUnit): string {
  return `unit${String(unit.ordinal).padStart(4, "0")}.ts`;
}

/**
 * 把模板单元交给引擎注册；指定 scratchDir 时先把单元写成文件。
 * 任何一个单元失败都会中止整个运行
 */
export function registerTemplateUnits(
  units: TemplateUnit[],
  engine: Pick<RewriteEngine, "registerUnit">,
  scratchDir?: string
): UnitHandle[] {
  return units.map((unit) => {
    let filePath: string | undefined;
    if (scratchDir) {
      filePath = path.join(scratchDir, unitFileName(unit));
      try {
        fs.writeFileSync(filePath, unit.source, { encoding: "utf8", mode: 0o600 });
      } catch (error) {
        abortWith("TEMPLATE001", [filePath, scratchDir], {
          filePath,
          originalError: error instanceof Error ? error : undefined,
        });
      }
    }

    try {
      return engine.registerUnit(unit.name, unit.source, filePath);
    } catch (error) {
      if (error instanceof FatalMigrationError) throw error;
      abortWith("TEMPLATE002", [unit.name], {
        filePath,
        originalError: error instanceof Error ? error : undefined,
      });
    }
  });
}
