/**
 * 工作区包发现与选择
 */

import fs from "fs";
import path from "path";
import { globSync } from "glob";
import { minimatch } from "minimatch";
import traverse from "@babel/traverse";
import * as t from "@babel/types";
import type { WorkspacePackage } from "../core/types";
import { ASTParserUtils } from "../core/utils";
import { abortWith, FatalMigrationError } from "../core/error-handler";

export interface DiscoverOptions {
  include: string;
  ignore: string[];
}

const DEPENDENCY_FIELDS = ["dependencies", "devDependencies", "peerDependencies"] as const;

function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readManifest(manifestPath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(manifestPath, "utf8"));
  } catch (error) {
    abortWith("LOAD003", [manifestPath], {
      filePath: manifestPath,
      originalError: error instanceof Error ? error : undefined,
    });
  }
  if (!isRecord(parsed)) {
    abortWith("LOAD003", [manifestPath], { filePath: manifestPath });
  }
  return parsed;
}

function isInside(dir: string, filePath: string): boolean {
  const relative = path.relative(dir, filePath);
  return relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative);
}

/**
 * 查找根目录下的所有包（含 package.json 的目录）。
 * 每个包只包含自己的源文件，嵌套包目录中的文件归嵌套包所有
 */
export function discoverPackages(root: string, options: DiscoverOptions): WorkspacePackage[] {
  const manifests = globSync("**/package.json", {
    cwd: root,
    absolute: true,
    nodir: true,
    ignore: ["**/node_modules/**", ...options.ignore],
  }).sort();
  const dirs = manifests.map((manifest) => path.dirname(manifest));

  return manifests.map((manifestPath, index) => {
    const dir = dirs[index];
    const manifest = readManifest(manifestPath);
    const name =
      typeof manifest.name === "string" && manifest.name
        ? manifest.name
        : toPosix(path.relative(root, dir)) || ".";

    const dependencies = new Set<string>();
    for (const field of DEPENDENCY_FIELDS) {
      const deps = manifest[field];
      if (isRecord(deps)) Object.keys(deps).forEach((dep) => dependencies.add(dep));
    }

    const nested = dirs.filter((other) => isInside(dir, other));
    const files = globSync(options.include, {
      cwd: dir,
      absolute: true,
      nodir: true,
      ignore: options.ignore,
    })
      .filter((file) => !nested.some((other) => isInside(other, file)))
      .sort();

    return { name, dir, files, dependencies: [...dependencies].sort() };
  });
}

/**
 * 收集包源码中的裸模块说明符（import / export from / require / import()）
 */
export function collectImportSpecifiers(pkg: WorkspacePackage): Set<string> {
  const specifiers = new Set<string>();
  const add = (value: string): void => {
    if (!value.startsWith(".") && !path.isAbsolute(value)) specifiers.add(value);
  };

  for (const filePath of pkg.files) {
    let ast: t.File;
    try {
      ast = ASTParserUtils.parseCode(fs.readFileSync(filePath, "utf8"), filePath);
    } catch (error) {
      if (error instanceof FatalMigrationError) throw error;
      const original = error instanceof Error ? error : new Error(String(error));
      const position = original.message.match(/\((\d+):(\d+)\)/);
      abortWith("LOAD001", [filePath, position ? position[1] : "?"], {
        filePath,
        originalError: original,
      });
    }

    traverse(ast, {
      ImportDeclaration(p) {
        add(p.node.source.value);
      },
      ExportNamedDeclaration(p) {
        if (p.node.source) add(p.node.source.value);
      },
      ExportAllDeclaration(p) {
        add(p.node.source.value);
      },
      CallExpression(p) {
        const [first] = p.node.arguments;
        const callee = p.node.callee;
        const isLoader = t.isImport(callee) || t.isIdentifier(callee, { name: "require" });
        if (isLoader && t.isStringLiteral(first)) add(first.value);
      },
    });
  }
  return specifiers;
}

/**
 * 包 dependent 是否直接依赖 dependency（清单依赖或源码导入）
 */
export function dependsOn(
  dependent: WorkspacePackage,
  dependency: string,
  specifiers: Set<string>
): boolean {
  if (dependent.dependencies.includes(dependency)) return true;
  for (const specifier of specifiers) {
    if (specifier === dependency || specifier.startsWith(`${dependency}/`)) return true;
  }
  return false;
}

function matchesPattern(pkg: WorkspacePackage, pattern: string, root: string): boolean {
  if (pkg.name === pattern || minimatch(pkg.name, pattern)) return true;
  if (path.resolve(root, pattern) === pkg.dir) return true;
  const relativeDir = toPosix(path.relative(root, pkg.dir)) || ".";
  const dirPattern = pattern.replace(/^\.\//, "").replace(/\/+$/, "");
  return dirPattern !== "" && minimatch(relativeDir, dirPattern);
}

export interface ResolveOptions {
  root: string;
  transitive: boolean;
}

/**
 * 按参数选出要迁移的包。参数可以是包名、包名 glob、目录路径或目录 glob；
 * 任一参数没有匹配到包都是致命错误。
 * transitive 模式下加入所有直接或间接依赖已选包的包
 */
export function resolvePackageSet(
  all: WorkspacePackage[],
  patterns: string[],
  options: ResolveOptions
): WorkspacePackage[] {
  if (patterns.length === 0) {
    abortWith("LOAD002", ["(no packages given)"]);
  }

  const selected = new Set<string>();
  for (const pattern of patterns) {
    const matched = all.filter((pkg) => matchesPattern(pkg, pattern, options.root));
    if (matched.length === 0) {
      abortWith("LOAD002", [pattern]);
    }
    matched.forEach((pkg) => selected.add(pkg.dir));
  }

  if (options.transitive) {
    const specifierCache = new Map<string, Set<string>>();
    const specifiersOf = (pkg: WorkspacePackage): Set<string> => {
      let cached = specifierCache.get(pkg.dir);
      if (!cached) {
        cached = collectImportSpecifiers(pkg);
        specifierCache.set(pkg.dir, cached);
      }
      return cached;
    };

    let grew = true;
    while (grew) {
      grew = false;
      const selectedNames = all.filter((pkg) => selected.has(pkg.dir)).map((pkg) => pkg.name);
      for (const pkg of all) {
        if (selected.has(pkg.dir)) continue;
        if (selectedNames.some((name) => dependsOn(pkg, name, specifiersOf(pkg)))) {
          selected.add(pkg.dir);
          grew = true;
        }
      }
    }
  }

  return all.filter((pkg) => selected.has(pkg.dir));
}
