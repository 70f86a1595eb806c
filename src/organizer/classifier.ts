/**
 * 확장자 → 카테고리 분류기
 *
 * 마지막 "." 뒤를 확장자로 보고 소문자로 비교한다.
 * 표에 없으면 (확장자가 없는 경우 포함) Others.
 */

import { CATEGORY_TABLE, OTHERS_CATEGORY } from "../config/constants.js";
import type { CategoryTable } from "./types.js";

/**
 * 파일명에서 확장자를 꺼낸다 (점 제외, 소문자).
 * "." 이 없거나 마지막 글자면 빈 문자열.
 */
export function getExtension(filename: string): string {
  const dotPos = filename.lastIndexOf(".");
  if (dotPos === -1 || dotPos === filename.length - 1) {
    return "";
  }
  return filename.slice(dotPos + 1).toLowerCase();
}

export function classify(filename: string, table: CategoryTable = CATEGORY_TABLE): string {
  const ext = getExtension(filename);
  if (!ext) return OTHERS_CATEGORY;

  for (const category of table) {
    if (category.extensions.has(ext)) {
      return category.name;
    }
  }
  return OTHERS_CATEGORY;
}
