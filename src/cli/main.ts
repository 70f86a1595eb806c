import * as path from "path";
import pc from "picocolors";
import { CATEGORY_TABLE, PROGRAM_NAME, readVersion } from "../config/constants.js";
import { loadSettings, type Settings } from "../config/loader.js";
import {
  DirectoryReadError,
  formatHeader,
  formatReport,
  hasErrors,
  runOrganizer,
  type OrganizeConfig,
} from "../organizer/index.js";
import { parseArguments } from "./args.js";
import { runInit } from "./init.js";

// ===== 도움말 =====
const HELP_PREVIEW_COUNT = 5;

export function formatHelp(): string {
  const lines: string[] = [];
  const version = readVersion();

  lines.push(pc.bold(`File Organizer - ${PROGRAM_NAME}${version ? ` v${version}` : ""}`));
  lines.push("");
  lines.push("A command-line tool that organizes files into categorized subfolders.");
  lines.push(`
${pc.bold("Usage:")}
  ${PROGRAM_NAME} [options] [directory]
  ${PROGRAM_NAME} init                      Create a settings file interactively

${pc.bold("Directory Options:")}
  ${PROGRAM_NAME}                           Top-level files only (default)
  ${PROGRAM_NAME} -r                        Recursive - process all files in current dir and subdirs
  ${PROGRAM_NAME} -r --depth N              Process up to N levels deep (N >= 1)

${pc.bold("Options:")}
  -r, --recursive            Enable recursive directory traversal
  -d, --depth <number>       Maximum depth for recursion (default: 1)
  -p, --prefix <text>        Add a prefix to category folder names
  -v, --verbose              Show detailed progress information
  -n, --dry-run              Preview what would be done without making changes
  -h, --help                 Show this help message
  --version                  Show version information

${pc.bold("Settings:")}
  Defaults are read from ./.forg.yaml, then ~/.forg.yaml. Options override them.

${pc.bold("Examples:")}
  ${PROGRAM_NAME}                           Organize top-level files only
  ${PROGRAM_NAME} -r                        Organize all files recursively
  ${PROGRAM_NAME} -r --depth 2              Organize files up to 2 levels deep
  ${PROGRAM_NAME} -p backup_                Organize with 'backup_' prefix
  ${PROGRAM_NAME} -n ~/Downloads            Preview organizing ~/Downloads
  ${PROGRAM_NAME} -- init                   Organize a directory named 'init' (or ./init)
`);
  lines.push(pc.bold("Categories:"));

  for (const category of CATEGORY_TABLE) {
    const extensions = [...category.extensions];
    let summary = extensions.slice(0, HELP_PREVIEW_COUNT).join(", ");
    if (extensions.length > HELP_PREVIEW_COUNT) {
      summary += ` + ${extensions.length - HELP_PREVIEW_COUNT} more`;
    }
    lines.push(`  ${pc.blue(category.name)}: ${summary}`);
  }
  lines.push(`  ${pc.blue("Others")}: Files with unrecognized extensions`);

  return lines.join("\n");
}

// ===== 실행 =====

const SCRIPT_EXTENSIONS = new Set([".js", ".mjs", ".cjs", ".ts"]);

/**
 * 정리에서 제외할 자기 자신의 파일 이름.
 * `node dist/index.js` 나 npm 의 Windows 실행 래퍼처럼 스크립트 경로로 실행되면
 * argv[1] 은 진입 스크립트라서, 같은 이름의 사용자 파일까지 제외되지 않도록 기본 이름만 쓴다.
 */
export function resolveProgramName(programPath: string): string {
  const base = path.basename(programPath);
  return SCRIPT_EXTENSIONS.has(path.extname(base).toLowerCase()) ? PROGRAM_NAME : base;
}

/**
 * CLI 진입점. 종료 코드를 반환한다 (0 = 오류 없음).
 */
export async function runCli(
  args: string[] = process.argv.slice(2),
  programPath: string = process.argv[1] ?? PROGRAM_NAME,
): Promise<number> {
  const parsed = parseArguments(args);
  printWarnings(parsed.warnings);

  switch (parsed.command) {
    case "help":
      console.log(formatHelp());
      return 0;

    case "version":
      console.log(`${PROGRAM_NAME} v${readVersion() ?? "unknown"}`);
      return 0;

    case "init":
      return runInit(process.cwd());

    case "run":
      break;
  }

  const startDir = path.resolve(parsed.directory ?? process.cwd());
  const loaded = loadSettings(startDir);
  printWarnings(loaded.warnings);

  const settings: Settings = { ...loaded.settings, ...parsed.options };
  const config: OrganizeConfig = {
    startDir,
    programName: resolveProgramName(programPath),
    prefix: settings.prefix,
    verbose: settings.verbose,
    dryRun: settings.dryRun,
    recursive: settings.recursive,
    maxDepth: settings.depth,
  };

  if (config.verbose && loaded.source) {
    console.log(`[Config] Loaded: ${loaded.source}`);
  }

  console.log(formatHeader(config));

  try {
    const report = runOrganizer(config);
    console.log(formatReport(report));
    return hasErrors(report) ? 1 : 0;
  } catch (err) {
    // 시작 디렉토리를 못 읽으면 정리할 것이 없다
    if (err instanceof DirectoryReadError) {
      console.error(pc.red(err.message));
      return 1;
    }
    throw err;
  }
}

function printWarnings(warnings: string[]): void {
  for (const warning of warnings) {
    console.warn(pc.yellow(warning));
  }
  if (warnings.some((w) => w.startsWith("Unknown option"))) {
    console.warn(`Use '${PROGRAM_NAME} --help' for usage information.`);
  }
}
