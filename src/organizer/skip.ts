import { PROGRAM_NAME, SKIP_PATTERNS } from "../config/constants.js";
import type { SkipEntry } from "./types.js";

/**
 * 정리 대상에서 뺄 항목인지 판별한다 (파일/디렉토리 공통).
 * 숨김 이름이거나 SKIP_PATTERNS 와 정확히 일치하면 true.
 */
export function shouldSkip(entry: SkipEntry): boolean {
  const { name } = entry;

  // dotfile (.git, .env, .hidden ...)
  if (name.length > 0 && name.startsWith(".")) return true;

  return SKIP_PATTERNS.has(name);
}

/** 실행 중인 프로그램 파일 자신인지 (이름 비교만) */
export function isProgramFile(name: string, programName: string): boolean {
  return name === programName || name === PROGRAM_NAME;
}
