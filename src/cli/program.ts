import { Command, CommanderError } from "commander";
import type { RewriteEngine } from "../core/types";
import type { Logger } from "../core/logger";
import type { MigrateOptions } from "../types";
import { enhanceError, formatErrorForUser } from "../core/error-handler";
import { BabelRewriteEngine } from "../engine/babel-engine";
import { migratePackages } from "../processPackages";

export interface CliContext {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  logger?: Logger;
  engine?: RewriteEngine;
}

interface CliOptions {
  transitive?: boolean;
  verbose?: boolean;
  dryRun?: boolean;
  config?: string;
  root?: string;
}

export function buildProgram(context: CliContext, engine: RewriteEngine): Command {
  return new Command()
    .name("assert-migrate")
    .description("把 testify/require 与 testify/assert 的断言调用迁移到 testutil 断言库")
    .argument("[packages...]", "包名、包名 glob 或包目录")
    .option("--transitive", "同时迁移所有（间接）依赖所选包的包")
    .option("-v, --verbose", "输出每条规则的匹配次数")
    .option("-n, --dry-run", "只报告匹配，不写回文件")
    .option("-c, --config <file>", "配置文件路径（默认 <root>/assert-migrate.config.json）")
    .option("-r, --root <dir>", "工作区根目录（默认当前目录）")
    .helpOption("-h, --help", "显示帮助")
    .addHelpText("after", `\n${engine.usage}`)
    .configureOutput({
      writeOut: context.stdout,
      writeErr: context.stderr,
    })
    .exitOverride();
}

/**
 * 解析参数并执行迁移，返回进程退出码
 */
export async function runCli(argv: string[], context: CliContext): Promise<number> {
  const engine = context.engine ?? new BabelRewriteEngine();
  const program = buildProgram(context, engine);
  let exitCode = 0;

  program.action(async (packages: string[], cmdOptions: CliOptions) => {
    if (packages.length === 0) {
      program.outputHelp({ error: true });
      exitCode = 1;
      return;
    }

    const options: MigrateOptions = {
      root: cmdOptions.root,
      configFile: cmdOptions.config,
      transitive: cmdOptions.transitive,
      verbose: cmdOptions.verbose,
      dryRun: cmdOptions.dryRun,
      logger: context.logger,
      engine,
    };

    try {
      const result = await migratePackages(packages, options);
      const changed = result.files.filter((file) => file.matches > 0).length;
      context.stdout(
        `处理了 ${result.visitedPackages.length} 个包，${changed} 个文件有修改\n`
      );
    } catch (error) {
      context.stderr(`${formatErrorForUser(enhanceError(error))}\n`);
      exitCode = 1;
    }
  });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  return exitCode;
}
