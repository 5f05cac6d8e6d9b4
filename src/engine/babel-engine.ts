/**
 * 基于 Babel 的改写引擎
 * 解析模板单元和目标包，为每个单元生成匹配器，最后以最小文本修改写回文件
 */

import fs from "fs";
import path from "path";
import type {
  LoadedPackage,
  Matcher,
  ProgramImage,
  RewriteEngine,
  TargetFile,
  UnitHandle,
  WorkspacePackage,
} from "../core/types";
import { ASTParserUtils } from "../core/utils";
import { applyReplacements } from "../core/text-patcher";
import { abortWith, FatalMigrationError } from "../core/error-handler";
import { readImportRecords } from "../imports/import-set";
import { analyzeUnit } from "./unit-analyzer";
import type { AnalyzedUnit } from "./unit-analyzer";
import { matchUnit } from "./matcher";

export const ENGINE_HELP = `Rewrite engine (babel):
  Each template unit is a TypeScript module exporting before() and after()
  with identical signatures, each body a single <namespace>.<member>(...) call.
  A call matches before() when its callee is imported from the same module,
  it passes exactly as many arguments as before() takes, none of them spread,
  and no literal contradicts a boolean or string parameter. Matches are
  replaced by after(), reusing the original argument text.`;

export interface BabelProgramImage extends ProgramImage {
  readonly units: ReadonlyMap<string, AnalyzedUnit>;
}

/**
 * 读取并解析一个目标文件
 */
export function loadTargetFile(
  filePath: string,
  packageName: string,
  code?: string
): TargetFile {
  let originalCode = code;
  if (originalCode === undefined) {
    try {
      originalCode = fs.readFileSync(filePath, "utf8");
    } catch (error) {
      abortWith("FILE001", [filePath], {
        filePath,
        originalError: error instanceof Error ? error : undefined,
      });
    }
  }

  try {
    const ast = ASTParserUtils.parseCode(originalCode, filePath);
    return {
      filePath,
      packageName,
      originalCode,
      ast,
      imports: readImportRecords(ast),
      replacements: [],
    };
  } catch (error) {
    if (error instanceof FatalMigrationError) throw error;
    const original = error instanceof Error ? error : new Error(String(error));
    const position = original.message.match(/\((\d+):(\d+)\)/);
    abortWith("LOAD001", [filePath, position ? position[1] : "?"], {
      filePath,
      originalError: original,
    });
  }
}

/**
 * 按已记录的全部修改渲染文件内容
 */
export function renderTargetFile(file: TargetFile): string {
  return applyReplacements(file.originalCode, file.replacements);
}

export class BabelRewriteEngine implements RewriteEngine<BabelProgramImage> {
  readonly usage = ENGINE_HELP;
  private readonly registered = new Map<string, UnitHandle>();

  registerUnit(name: string, sourceText: string, filePath?: string): UnitHandle {
    if (this.registered.has(name)) {
      throw new Error(`Unit ${name} is already registered`);
    }
    const handle: UnitHandle = {
      name,
      ordinal: this.registered.size,
      source: sourceText,
      filePath,
    };
    this.registered.set(name, handle);
    return handle;
  }

  loadProgram(roots: WorkspacePackage[], units: UnitHandle[]): BabelProgramImage {
    const analyzed = new Map<string, AnalyzedUnit>();
    const packages: LoadedPackage[] = [];

    for (const handle of units) {
      if (this.registered.get(handle.name) !== handle) {
        abortWith("LOAD004", [handle.name, "unit was not registered with this engine"]);
      }
      const unit = analyzeUnit(handle);
      analyzed.set(handle.name, unit);
      const filePath = handle.filePath ?? `${handle.name}.ts`;
      packages.push({
        name: handle.name,
        dir: handle.filePath ? path.dirname(handle.filePath) : "",
        files: [
          {
            filePath,
            packageName: handle.name,
            originalCode: handle.source,
            ast: unit.ast,
            imports: readImportRecords(unit.ast),
            replacements: [],
          },
        ],
      });
    }

    for (const root of roots) {
      packages.push({
        name: root.name,
        dir: root.dir,
        files: root.files.map((filePath) => loadTargetFile(filePath, root.name)),
      });
    }

    return { packages, units: analyzed };
  }

  makeMatcher(program: BabelProgramImage, unit: UnitHandle): Matcher {
    const analyzed = program.units.get(unit.name);
    if (!analyzed) {
      abortWith("LOAD004", [unit.name, "unit is not part of the loaded program"]);
    }
    return {
      unit,
      apply: (file) => matchUnit(analyzed, file),
    };
  }

  writeFile(filePath: string, file: TargetFile): void {
    fs.writeFileSync(filePath, renderTargetFile(file), "utf8");
  }
}
