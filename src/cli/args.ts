/**
 * CLI 인자 파싱
 *
 * 잘못된 값이나 모르는 옵션은 경고로 모으고 기본값으로 진행한다.
 */

import { clampDepth, type Settings } from "../config/loader.js";

export type Command = "run" | "help" | "version" | "init";

export interface ParsedArgs {
  command: Command;
  /** 명시된 옵션만 담긴다 (설정 파일 값 위에 덮어씀) */
  options: Partial<Settings>;
  directory?: string;
  warnings: string[];
}

// init 의 깊이 입력과 같은 규칙 (1e1, 0x2 같은 표기는 받지 않음)
const INTEGER_PATTERN = /^-?\d+$/;

export function parseArguments(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = { command: "run", options: {}, warnings: [] };
  let showHelp = false;
  let showVersion = false;
  let optionsEnded = false;

  let i = 0;
  if (args[0] === "init") {
    parsed.command = "init";
    i = 1;
  }

  for (; i < args.length; i++) {
    const arg = args[i];
    const hasValue = i + 1 < args.length;

    // "--" 뒤는 전부 위치 인자 (forg -- init)
    if (optionsEnded) {
      takePositional(parsed, arg);
      continue;
    }
    if (arg === "--") {
      optionsEnded = true;
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        showHelp = true;
        continue;
      case "--version":
        showVersion = true;
        continue;
      case "-v":
      case "--verbose":
        parsed.options.verbose = true;
        continue;
      case "-n":
      case "--dry-run":
        parsed.options.dryRun = true;
        continue;
      case "-r":
      case "--recursive":
        parsed.options.recursive = true;
        continue;
    }

    if ((arg === "-d" || arg === "--depth") && hasValue) {
      const raw = args[++i].trim();
      if (INTEGER_PATTERN.test(raw)) {
        parsed.options.depth = clampDepth(Number(raw), parsed.warnings);
      } else {
        parsed.warnings.push("Warning: invalid depth value, using default");
      }
      continue;
    }

    if ((arg === "-p" || arg === "--prefix") && hasValue) {
      parsed.options.prefix = args[++i];
      continue;
    }

    if (arg.startsWith("-")) {
      parsed.warnings.push(`Unknown option: ${arg}`);
    } else {
      takePositional(parsed, arg);
    }
  }

  // 도움말 > 버전 > 나머지
  if (showHelp) parsed.command = "help";
  else if (showVersion) parsed.command = "version";

  return parsed;
}

/** 첫 위치 인자만 대상 디렉토리 (run 일 때) */
function takePositional(parsed: ParsedArgs, arg: string): void {
  if (parsed.command === "run" && parsed.directory === undefined) {
    parsed.directory = arg;
  } else {
    parsed.warnings.push(`Unknown option: ${arg}`);
  }
}
