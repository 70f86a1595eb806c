import type { ErrorKind } from "./types.js";

export class OrganizeError extends Error {
  readonly kind: ErrorKind;
  readonly path: string;

  constructor(kind: ErrorKind, path: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "OrganizeError";
    this.kind = kind;
    this.path = path;
  }
}

/** 디렉토리 목록을 읽지 못함 (권한, 탐색 중 삭제 등) */
export class DirectoryReadError extends OrganizeError {
  constructor(dir: string, cause?: unknown) {
    super("directory-read", dir, `Error accessing directory ${dir}: ${describeError(cause)}`, cause);
    this.name = "DirectoryReadError";
  }
}

/** 카테고리 폴더 생성 실패 */
export class DestinationCreateError extends OrganizeError {
  constructor(dir: string, cause?: unknown) {
    super("destination-create", dir, `Error creating directory ${dir}: ${describeError(cause)}`, cause);
    this.name = "DestinationCreateError";
  }
}

/** rename 실패 (권한, 다른 볼륨, 원본이 사라짐) */
export class MoveError extends OrganizeError {
  constructor(source: string, destination: string, cause?: unknown) {
    super("move", source, `Error moving ${source} -> ${destination}: ${describeError(cause)}`, cause);
    this.name = "MoveError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
