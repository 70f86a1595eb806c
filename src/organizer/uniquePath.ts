/**
 * 파일명 충돌 회피
 *
 * photo.png 가 이미 있으면 photo_1.png, photo_2.png ... 순서로 비어있는 이름을 찾는다.
 * 잠금은 없으므로 이동 직전에 호출해야 한다.
 */

import { existsSync } from "fs";
import * as path from "path";
import { MAX_UNIQUE_ATTEMPTS } from "../config/constants.js";

export type ExistsFn = (filePath: string) => boolean;

export interface ResolvePathOptions {
  exists?: ExistsFn;
  /** 타임스탬프 폴백용 (ms) */
  now?: () => number;
}

/** "archive.tar.gz" → ["archive.tar", ".gz"], ".profile" → [".profile", ""] */
export function splitName(filename: string): [base: string, ext: string] {
  const dotPos = filename.lastIndexOf(".");
  if (dotPos > 0) {
    return [filename.slice(0, dotPos), filename.slice(dotPos)];
  }
  return [filename, ""];
}

export function resolvePath(
  destinationDir: string,
  desiredFilename: string,
  options: ResolvePathOptions = {},
): string {
  const exists = options.exists ?? existsSync;
  const now = options.now ?? Date.now;

  const targetPath = path.join(destinationDir, desiredFilename);
  if (!exists(targetPath)) {
    return targetPath;
  }

  const [base, ext] = splitName(desiredFilename);

  for (let counter = 1; counter <= MAX_UNIQUE_ATTEMPTS; counter++) {
    const candidate = path.join(destinationDir, `${base}_${counter}${ext}`);
    if (!exists(candidate)) {
      return candidate;
    }
  }

  // 1000번 넘게 충돌하면 타임스탬프로 (존재 확인 없이)
  return path.join(destinationDir, `${base}_${now()}${ext}`);
}
