/**
 * 정리 엔진 통합 export
 */

// 타입
export type {
  OrganizeConfig,
  CategoryDefinition,
  CategoryTable,
  CandidateEntry,
  SkipEntry,
  MoveOutcome,
  ErrorKind,
  Report,
} from "./types.js";

// 분류 / 제외 규칙
export { classify, getExtension } from "./classifier.js";
export { shouldSkip, isProgramFile } from "./skip.js";

// 충돌 회피
export { resolvePath, splitName, type ResolvePathOptions, type ExistsFn } from "./uniquePath.js";

// 탐색 + 정리
export { collect, type CollectResult } from "./traversal.js";
export {
  runOrganizer,
  organize,
  hasErrors,
  getFolderName,
  ALREADY_ORGANIZED,
} from "./organizer.js";
export { liveActions, createDryRunActions, createActions, type FileActions } from "./actions.js";

// 오류
export {
  OrganizeError,
  DirectoryReadError,
  DestinationCreateError,
  MoveError,
  describeError,
} from "./errors.js";

// 출력
export { formatHeader, formatReport, orderCategories } from "./report.js";
