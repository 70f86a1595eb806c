/**
 * .forg.yaml 로더
 *
 * 우선순위: <대상 디렉토리>/.forg.yaml > ~/.forg.yaml > 기본값
 * CLI 옵션은 이 값 위에 덮어쓴다 (cli/args.ts).
 */

import { readFileSync, existsSync, writeFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import yaml from "js-yaml";
import { SETTINGS_FILE_NAME } from "./constants.js";

// ============================================
// 타입 정의
// ============================================

export interface Settings {
  prefix: string;
  verbose: boolean;
  dryRun: boolean;
  recursive: boolean;
  depth: number;
}

export interface LoadedSettings {
  settings: Settings;
  /** 실제로 읽은 파일. 없으면 null */
  source: string | null;
  /** 치명적이지 않은 설정 경고 (기본값으로 대체됨) */
  warnings: string[];
}

// ============================================
// 기본값
// ============================================

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  prefix: "",
  verbose: false,
  dryRun: false,
  recursive: false,
  depth: 1,
};

// ============================================
// 검증
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** depth 는 1 이상 정수. 아니면 경고 후 1 */
export function clampDepth(value: number, warnings: string[]): number {
  if (!Number.isInteger(value)) {
    warnings.push("Warning: invalid depth value, using default");
    return DEFAULT_SETTINGS.depth;
  }
  if (value < 1) {
    warnings.push("Warning: depth must be >= 1, using default");
    return DEFAULT_SETTINGS.depth;
  }
  return value;
}

/**
 * 파싱된 YAML 을 기본값 위에 키 단위로 병합한다.
 * 타입이 맞지 않거나 모르는 키는 경고만 남기고 무시.
 */
export function mergeSettings(base: Settings, source: unknown, warnings: string[]): Settings {
  const result: Settings = { ...base };
  if (source === undefined || source === null) return result;

  if (!isRecord(source)) {
    warnings.push("Warning: settings file must contain a mapping, ignoring it");
    return result;
  }

  const wrongType = (key: string, expected: string) => {
    warnings.push(`Warning: setting "${key}" must be a ${expected}, using default`);
  };

  for (const [key, value] of Object.entries(source)) {
    switch (key) {
      case "prefix":
        if (typeof value === "string") result.prefix = value;
        else wrongType(key, "string");
        break;
      case "verbose":
        if (typeof value === "boolean") result.verbose = value;
        else wrongType(key, "boolean");
        break;
      case "dryRun":
        if (typeof value === "boolean") result.dryRun = value;
        else wrongType(key, "boolean");
        break;
      case "recursive":
        if (typeof value === "boolean") result.recursive = value;
        else wrongType(key, "boolean");
        break;
      case "depth":
        if (typeof value === "number") result.depth = clampDepth(value, warnings);
        else wrongType(key, "number");
        break;
      default:
        warnings.push(`Warning: unknown setting "${key}" ignored`);
    }
  }

  return result;
}

// ============================================
// 로더
// ============================================

export function getSettingsCandidates(startDir: string, homeDir: string = homedir()): string[] {
  return [join(startDir, SETTINGS_FILE_NAME), join(homeDir, SETTINGS_FILE_NAME)];
}

/**
 * 설정 파일 로드. 처음 발견된 파일 하나만 사용한다.
 */
export function loadSettings(startDir: string, homeDir?: string): LoadedSettings {
  const warnings: string[] = [];

  for (const filePath of getSettingsCandidates(startDir, homeDir)) {
    if (!existsSync(filePath)) continue;

    let parsed: unknown;
    try {
      parsed = yaml.load(readFileSync(filePath, "utf-8"));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push(`[Config] Failed to parse ${filePath}: ${msg}`);
      return { settings: { ...DEFAULT_SETTINGS }, source: null, warnings };
    }

    return {
      settings: mergeSettings(DEFAULT_SETTINGS, parsed, warnings),
      source: filePath,
      warnings,
    };
  }

  return { settings: { ...DEFAULT_SETTINGS }, source: null, warnings };
}

/** forg init 용 */
export function saveSettings(filePath: string, settings: Settings): void {
  const content = yaml.dump(settings, { lineWidth: -1 });
  writeFileSync(filePath, `# forg settings\n${content}`);
}
