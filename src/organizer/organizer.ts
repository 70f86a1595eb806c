/**
 * 정리 오케스트레이터
 *
 * 탐색 → 카테고리 폴더 결정 → 충돌 회피 이름 → 이동(또는 dry-run 기록) → 리포트
 * 항목 하나의 실패는 그 항목만 errored 로 남기고 다음으로 넘어간다.
 */

import * as path from "path";
import pc from "picocolors";
import { createActions, type FileActions } from "./actions.js";
import { DestinationCreateError, MoveError, type OrganizeError } from "./errors.js";
import { collect } from "./traversal.js";
import { resolvePath } from "./uniquePath.js";
import type { CandidateEntry, MoveOutcome, OrganizeConfig, Report } from "./types.js";

export const ALREADY_ORGANIZED = "already organized";

// ============================================
// 메인 함수
// ============================================

/**
 * 탐색과 정리를 한 번에 실행한다.
 * 시작 디렉토리를 읽지 못하면 DirectoryReadError 가 그대로 전파된다.
 */
export function runOrganizer(config: OrganizeConfig): Report {
  const collected = collect(config);
  const report = organize(collected.candidates, config);

  report.skippedCount += collected.skipped;
  report.traversalErrors = collected.errors.map((err) => err.message);
  return report;
}

/**
 * 후보 목록을 순서대로 처리한다.
 * actions 를 생략하면 config.dryRun 에 맞는 구현을 새로 만든다.
 */
export function organize(
  candidates: readonly CandidateEntry[],
  config: OrganizeConfig,
  actions: FileActions = createActions(config.dryRun),
): Report {
  const report: Report = {
    countsByCategory: {},
    skippedCount: 0,
    erroredCount: 0,
    totalCandidates: candidates.length,
    outcomes: [],
    traversalErrors: [],
    dryRun: config.dryRun,
  };

  for (const candidate of candidates) {
    const outcome = processCandidate(candidate, config, actions);
    report.outcomes.push(outcome);

    switch (outcome.status) {
      case "moved":
        report.countsByCategory[outcome.category] = (report.countsByCategory[outcome.category] ?? 0) + 1;
        break;
      case "skipped":
        report.skippedCount++;
        break;
      case "errored":
        report.erroredCount++;
        break;
    }
  }

  return report;
}

/** 오류가 하나라도 있으면 실패 (exit code 판단용) */
export function hasErrors(report: Report): boolean {
  return report.erroredCount > 0 || report.traversalErrors.length > 0;
}

/** prefix + 카테고리 */
export function getFolderName(category: string, prefix: string): string {
  return prefix ? `${prefix}${category}` : category;
}

// ============================================
// 내부 함수
// ============================================

function processCandidate(
  candidate: CandidateEntry,
  config: OrganizeConfig,
  actions: FileActions,
): MoveOutcome {
  const { sourcePath, category } = candidate;
  const fileName = path.basename(sourcePath);
  const folderName = getFolderName(category, config.prefix);
  const targetDir = path.join(config.startDir, folderName);

  // 재귀 모드 재실행 시 카테고리 폴더 안의 파일이 다시 잡힌다
  if (path.resolve(path.dirname(sourcePath)) === path.resolve(targetDir)) {
    if (config.verbose) {
      console.log(pc.yellow(`Skipping: ${fileName} (${ALREADY_ORGANIZED})`));
    }
    return { status: "skipped", sourcePath, reason: ALREADY_ORGANIZED };
  }

  try {
    actions.ensureDir(targetDir);
  } catch (err) {
    return fail(sourcePath, new DestinationCreateError(folderName, err));
  }

  const targetPath = resolvePath(targetDir, fileName, {
    exists: (filePath) => actions.exists(filePath),
  });

  if (config.verbose) {
    console.log(`${pc.green("  Moving: ")}${fileName}`);
    console.log(`${pc.green("    From: ")}${sourcePath}`);
    console.log(`${pc.green("    To:   ")}${targetPath}`);
  }

  try {
    actions.move(sourcePath, targetPath);
  } catch (err) {
    return fail(sourcePath, new MoveError(sourcePath, targetPath, err));
  }

  if (config.dryRun) {
    console.log(pc.blue(`  → ${fileName} -> ${folderName}`));
  } else {
    console.log(pc.green(`  ✓ ${fileName} -> ${folderName}`));
  }

  return { status: "moved", sourcePath, destinationPath: targetPath, category };
}

function fail(sourcePath: string, error: OrganizeError): MoveOutcome {
  console.error(pc.red(`  ✗ ${error.message}`));
  return { status: "errored", sourcePath, kind: error.kind, reason: error.message };
}
