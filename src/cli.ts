import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { collectTodos, toCollectOptions } from "./collector.js";
import { loadConfigFile, resolveConfig, type CliOptions } from "./config/config.js";
import { EXIT_CODE, DEFAULT_INCLUDE_EXTS, DEFAULT_MARKERS, CLASSIFIER, DISCOVERY, OUTPUT, WALK } from "./config/constants.js";
import { renderJson, renderMarkdown, writeReport } from "./report/index.js";
import { ConfigError, ReportWriteError, RootUnreadableError, errorMessage } from "./errors.js";
import { LOG_LEVELS, logger } from "./core/logger.js";

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (text: string) => void;
  now: () => Date;
}

const defaultIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (text) => process.stderr.write(text),
  now: () => new Date(),
};

function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function buildProgram(io: CliIO = defaultIO): Command {
  return new Command("collect-todos")
    .description("Aggregate TODO/FIXME/BUG markers across sibling repositories into a Markdown report")
    .option("--root <dir>", `directory containing the repositories (default: ${DISCOVERY.ROOT})`)
    .option("--self <name>", `directory name excluded from discovery (default: ${DISCOVERY.SELF_NAME})`)
    .option("--repos <list>", "comma-separated repository names to scan instead of discovery", parseList)
    .option("--out-md <path>", `Markdown output path (default: ${OUTPUT.MARKDOWN_PATH})`)
    .option("--out-json <path>", "optional JSON output path")
    .option("--marker <list>", `comma-separated markers (default: ${DEFAULT_MARKERS.join(",")})`, parseList)
    .option("--include-ext <list>", `comma-separated extensions (default: ${DEFAULT_INCLUDE_EXTS.length} code/text types)`, parseList)
    .option("--extra-exclude <list>", "comma-separated extra directory names to skip", parseList)
    .option("--max-file-size <bytes>", `skip files larger than this (default: ${WALK.MAX_FILE_SIZE_BYTES})`, parsePositiveInt)
    .option("--critical-words <list>", `keywords marking a TODO critical (default: ${CLASSIFIER.KEYWORDS.join(",")})`, parseList)
    .option("--no-remote-links", "do not build links to the remote host")
    .option("--branch <name>", "branch name used in links (default: detected per repository)")
    .option("--fail-on-critical", `exit with ${EXIT_CODE.CRITICAL_FOUND} when critical markers are found`)
    .option("--config <path>", `JSON config file (default: ./${OUTPUT.CONFIG_FILE} when present)`)
    .addOption(new Option("--log-level <level>", "log level").choices(LOG_LEVELS))
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text),
    });
}

/**
 * CLIを実行し終了コードを返す
 *
 * 0: 走査完了（critical の有無に関わらず）
 * 1: ルート読み込み・レポート書き込み・設定の失敗
 * 2: --fail-on-critical 指定時に critical が見つかった
 */
export function run(argv: string[], io: CliIO = defaultIO): number {
  const program = buildProgram(io);

  try {
    program.parse(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODE.OK : EXIT_CODE.FAILURE;
    }
    throw error;
  }

  const cli = program.opts<CliOptions>();

  try {
    if (cli.logLevel) {
      logger.setLevel(cli.logLevel);
    }
    const config = resolveConfig(cli, loadConfigFile(cli.config));
    if (config.logLevel) {
      logger.setLevel(config.logLevel);
    }

    const report = collectTodos(toCollectOptions(config));

    writeReport(config.outMarkdown, renderMarkdown(report));
    io.stdout(`Wrote ${config.outMarkdown} (items: ${report.total}, critical: ${report.criticalCount})`);

    if (config.outJson) {
      writeReport(config.outJson, renderJson(report, io.now()));
      io.stdout(`Wrote ${config.outJson}`);
    }

    if (report.hasCritical) {
      logger.warn("Critical TODOs detected", {
        count: report.criticalCount,
        keywords: config.criticalWords,
      });
      if (config.failOnCritical) {
        return EXIT_CODE.CRITICAL_FOUND;
      }
    }

    return EXIT_CODE.OK;
  } catch (error) {
    if (error instanceof RootUnreadableError || error instanceof ReportWriteError || error instanceof ConfigError) {
      logger.error(error.message);
    } else {
      logger.error("Unexpected failure", { error: errorMessage(error) });
    }
    return EXIT_CODE.FAILURE;
  }
}
