/**
 * 파일시스템 변경 동작
 *
 * 실제 실행과 dry-run 이 같은 결정 경로를 타도록 mkdir / rename / 존재 확인을
 * 하나의 인터페이스로 묶는다. dry-run 구현은 아무것도 바꾸지 않지만, 이번 실행에서
 * "채운" 경로와 "비운" 경로를 기억해서 충돌 이름 미리보기가 실제 실행과 같게 나온다.
 */

import { existsSync, mkdirSync, renameSync } from "fs";
import * as path from "path";

export interface FileActions {
  exists(filePath: string): boolean;
  ensureDir(dir: string): void;
  move(source: string, destination: string): void;
}

export const liveActions: FileActions = {
  exists: (filePath) => existsSync(filePath),
  ensureDir: (dir) => {
    mkdirSync(dir, { recursive: true });
  },
  move: (source, destination) => {
    renameSync(source, destination);
  },
};

/** 실행 1회용. 상태가 실행 사이에 공유되지 않도록 매번 새로 만든다 */
export function createDryRunActions(): FileActions {
  const filled = new Set<string>();
  const vacated = new Set<string>();

  return {
    exists(filePath) {
      const resolved = path.resolve(filePath);
      if (filled.has(resolved)) return true;
      if (vacated.has(resolved)) return false;
      return existsSync(resolved);
    },
    ensureDir() {
      // dry-run: 생성하지 않음
    },
    move(source, destination) {
      const from = path.resolve(source);
      const to = path.resolve(destination);
      filled.delete(from);
      vacated.add(from);
      vacated.delete(to);
      filled.add(to);
    },
  };
}

export function createActions(dryRun: boolean): FileActions {
  return dryRun ? createDryRunActions() : liveActions;
}
