/**
 * 디렉토리 탐색
 *
 * 시작 디렉토리부터 (재귀 모드면 maxDepth 까지) 내려가며 옮길 파일 목록을 만든다.
 * 폴더 생성 전에 전체 목록이 필요하므로 스트리밍하지 않고 배열로 모은다.
 */

import { readdirSync, statSync, type Dirent } from "fs";
import * as path from "path";
import pc from "picocolors";
import { classify } from "./classifier.js";
import { DirectoryReadError } from "./errors.js";
import { isProgramFile, shouldSkip } from "./skip.js";
import type { CandidateEntry, OrganizeConfig } from "./types.js";

// ============================================
// 타입 정의
// ============================================

export interface CollectResult {
  candidates: CandidateEntry[];
  /** 제외된 파일/디렉토리 수 */
  skipped: number;
  /** 읽지 못한 하위 디렉토리 */
  errors: DirectoryReadError[];
}

// ============================================
// 메인 함수
// ============================================

/**
 * 정리 대상 파일을 모은다.
 * 시작 디렉토리 자체를 읽지 못하면 DirectoryReadError 를 던진다.
 */
export function collect(config: OrganizeConfig): CollectResult {
  const result: CollectResult = { candidates: [], skipped: 0, errors: [] };
  walk(config.startDir, 1, config, result);
  return result;
}

// ============================================
// 내부 함수
// ============================================

function walk(dir: string, depth: number, config: OrganizeConfig, result: CollectResult): void {
  const trace = (message: string) => {
    if (config.verbose) console.log(pc.yellow(message));
  };

  for (const entry of listDir(dir)) {
    const fullPath = path.join(dir, entry.name);

    if (isDirectoryEntry(entry, fullPath)) {
      if (!config.recursive) {
        trace(`Skipping directory: ${entry.name}`);
        result.skipped++;
      } else if (shouldSkip({ name: entry.name, isDirectory: true })) {
        trace(`Skipping: ${fullPath}`);
        result.skipped++;
      } else if (depth < config.maxDepth) {
        try {
          walk(fullPath, depth + 1, config, result);
        } catch (err) {
          // 하위 디렉토리 실패는 기록만 하고 형제 항목 계속
          if (!(err instanceof DirectoryReadError)) throw err;
          console.error(pc.red(err.message));
          result.errors.push(err);
        }
      } else {
        trace(`Skipping directory: ${entry.name}`);
        result.skipped++;
      }
      continue;
    }

    if (isProgramFile(entry.name, config.programName)) {
      trace(`Skipping program file: ${entry.name}`);
      result.skipped++;
      continue;
    }

    if (shouldSkip({ name: entry.name, isDirectory: false })) {
      trace(`Skipping: ${entry.name}`);
      result.skipped++;
      continue;
    }

    result.candidates.push({ sourcePath: fullPath, category: classify(entry.name) });
  }
}

function listDir(dir: string): Dirent[] {
  try {
    return readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    throw new DirectoryReadError(dir, err);
  }
}

/** 심볼릭 링크는 대상이 디렉토리면 디렉토리로 취급 */
function isDirectoryEntry(entry: Dirent, fullPath: string): boolean {
  if (entry.isDirectory()) return true;
  if (!entry.isSymbolicLink()) return false;

  try {
    return statSync(fullPath).isDirectory();
  } catch {
    // 깨진 링크는 일반 파일처럼 다룬다
    return false;
  }
}
