/**
 * 전역 상수
 * 카테고리 표는 data/categories.json 에서 한 번 읽어 고정한다.
 */

import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import type { CategoryDefinition, CategoryTable } from "../organizer/types.js";

// src/config 와 dist/config 모두 두 단계 위가 패키지 루트
const PACKAGE_ROOT = join(dirname(fileURLToPath(import.meta.url)), "..", "..");

export const PROGRAM_NAME = "forg";

/** 어떤 카테고리에도 속하지 않는 파일 */
export const OTHERS_CATEGORY = "Others";

/** 이름 충돌 시 _1, _2 ... 시도 상한. 넘으면 타임스탬프 사용 */
export const MAX_UNIQUE_ATTEMPTS = 1000;

/** 설정 파일명 (점으로 시작하므로 정리 대상에서 자동 제외됨) */
export const SETTINGS_FILE_NAME = ".forg.yaml";

// ============================================
// 건너뛸 이름
// ============================================

export const SKIP_PATTERNS: ReadonlySet<string> = new Set([
  // 버전 관리
  ".git", ".svn", ".hg", ".bzr",
  // IDE / 에디터
  ".vscode", ".idea", ".vs",
  // 빌드 산출물
  "build", "dist", "node_modules", ".cache", "__pycache__",
  // OS 가 만드는 파일
  ".DS_Store", "Thumbs.db", ".Spotlight-V100", ".Trashes",
]);

// ============================================
// 카테고리 표
// ============================================

interface RawCategory {
  name: string;
  extensions: string[];
}

function isRawCategory(value: unknown): value is RawCategory {
  if (!value || typeof value !== "object") return false;
  if (!("name" in value) || !("extensions" in value)) return false;
  const { name, extensions } = value;
  return (
    typeof name === "string" &&
    Array.isArray(extensions) &&
    extensions.every((ext) => typeof ext === "string")
  );
}

/**
 * 카테고리 JSON 을 읽어 순서가 보존된 불변 표로 만든다.
 */
export function loadCategoryTable(filePath = join(PACKAGE_ROOT, "data", "categories.json")): CategoryTable {
  const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));

  if (!Array.isArray(parsed) || !parsed.every(isRawCategory)) {
    throw new Error(`Invalid category table: ${filePath}`);
  }

  const table: CategoryDefinition[] = parsed.map((raw) =>
    Object.freeze({
      name: raw.name,
      extensions: new Set(raw.extensions.map((ext) => ext.toLowerCase())),
    }),
  );
  return Object.freeze(table);
}

export const CATEGORY_TABLE: CategoryTable = loadCategoryTable();

// ============================================
// 버전
// ============================================

/** package.json 의 version. 읽지 못하면 null */
export function readVersion(): string | null {
  try {
    const pkg: unknown = JSON.parse(readFileSync(join(PACKAGE_ROOT, "package.json"), "utf-8"));
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return null;
  } catch {
    return null;
  }
}
