/**
 * 정리 엔진 공용 타입
 */

// ============================================
// 설정
// ============================================

/** 한 번의 실행 동안 변하지 않는 정리 설정 */
export interface OrganizeConfig {
  readonly startDir: string;
  /** 실행 중인 프로그램 자신의 파일명 (자기 자신은 옮기지 않음) */
  readonly programName: string;
  readonly prefix: string;
  readonly verbose: boolean;
  readonly dryRun: boolean;
  readonly recursive: boolean;
  /** 1 이상. 1이면 시작 디렉토리의 직속 항목만 */
  readonly maxDepth: number;
}

// ============================================
// 카테고리
// ============================================

export interface CategoryDefinition {
  readonly name: string;
  readonly extensions: ReadonlySet<string>;
}

/** 선언 순서가 곧 우선순위. 같은 확장자가 여러 번 나오면 먼저 선언된 쪽이 이긴다 */
export type CategoryTable = ReadonlyArray<CategoryDefinition>;

// ============================================
// 탐색 / 이동 결과
// ============================================

export interface CandidateEntry {
  readonly sourcePath: string;
  readonly category: string;
}

export interface SkipEntry {
  name: string;
  isDirectory: boolean;
}

export type ErrorKind = "directory-read" | "destination-create" | "move";

export type MoveOutcome =
  | {
      status: "moved";
      sourcePath: string;
      destinationPath: string;
      category: string;
    }
  | { status: "skipped"; sourcePath: string; reason: string }
  | { status: "errored"; sourcePath: string; kind: ErrorKind; reason: string };

export interface Report {
  /** 카테고리별 이동(또는 dry-run 상 이동 예정) 파일 수 */
  countsByCategory: Record<string, number>;
  skippedCount: number;
  erroredCount: number;
  totalCandidates: number;
  outcomes: MoveOutcome[];
  /** 읽지 못한 하위 디렉토리 메시지 */
  traversalErrors: string[];
  dryRun: boolean;
}
