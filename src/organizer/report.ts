/**
 * 터미널 출력용 헤더 / 요약 문자열 생성
 */

import pc from "picocolors";
import { CATEGORY_TABLE, OTHERS_CATEGORY } from "../config/constants.js";
import type { OrganizeConfig, Report } from "./types.js";

const NAME_COLUMN_WIDTH = 20;
const RULE = "-".repeat(30);

export function formatHeader(config: OrganizeConfig): string {
  const lines: string[] = [];
  lines.push(pc.blue(`Organizing files in: ${config.startDir}`));

  if (config.recursive) {
    lines.push(pc.blue(`Recursive mode enabled (max depth: ${config.maxDepth})`));
  }
  if (config.prefix) {
    lines.push(pc.blue(`Using prefix: ${config.prefix}`));
  }
  if (config.dryRun) {
    lines.push(pc.yellow("[DRY RUN MODE - No changes will be made]"));
  }

  return lines.join("\n") + "\n";
}

/**
 * 카테고리 표 선언 순서대로 정렬. Others 는 마지막, 표에 없는 이름은 그 앞에 알파벳순.
 */
export function orderCategories(names: string[]): string[] {
  const rank = (name: string): number => {
    if (name === OTHERS_CATEGORY) return CATEGORY_TABLE.length + 1;
    const idx = CATEGORY_TABLE.findIndex((c) => c.name === name);
    return idx === -1 ? CATEGORY_TABLE.length : idx;
  };
  return [...names].sort((a, b) => rank(a) - rank(b) || a.localeCompare(b));
}

export function formatReport(report: Report): string {
  const errorTotal = report.erroredCount + report.traversalErrors.length;

  if (report.totalCandidates === 0) {
    const lines = [pc.yellow("No files to organize.")];
    if (errorTotal > 0) lines.push(pc.red(`Errors: ${errorTotal}`));
    return lines.join("\n");
  }

  const lines: string[] = [];
  lines.push("");
  lines.push(pc.green(pc.bold(report.dryRun ? "Dry Run Complete!" : "Organization Complete!")));
  lines.push("");
  lines.push(`${"Category".padEnd(NAME_COLUMN_WIDTH)}Files`);
  lines.push(RULE);

  for (const category of orderCategories(Object.keys(report.countsByCategory))) {
    lines.push(`${category.padEnd(NAME_COLUMN_WIDTH)}${report.countsByCategory[category]}`);
  }

  lines.push(RULE);
  lines.push(`${"Total".padEnd(NAME_COLUMN_WIDTH)}${report.totalCandidates}`);

  if (report.skippedCount > 0) {
    lines.push("");
    lines.push(pc.yellow(`Skipped: ${report.skippedCount} files/directories`));
  }

  if (errorTotal > 0) {
    lines.push("");
    lines.push(pc.red(`Errors: ${errorTotal}`));
  }

  return lines.join("\n");
}
