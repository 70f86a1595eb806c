/**
 * 테스트 공용 유틸
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { OrganizeConfig } from "../src/organizer/index.js";

/** macOS 에서 /tmp 는 심볼릭 링크라 realpath 기준으로 만든다 */
export function makeTempDir(prefix = "forg-test-"): string {
  const tmpBase = fs.realpathSync(os.tmpdir());
  return fs.mkdtempSync(path.join(tmpBase, prefix));
}

/**
 * 상대 경로 목록으로 파일 트리를 만든다. "/" 로 끝나면 빈 디렉토리.
 */
export function createTree(root: string, entries: string[]): void {
  for (const rel of entries) {
    const full = path.join(root, rel);
    if (rel.endsWith("/")) {
      fs.mkdirSync(full, { recursive: true });
    } else {
      fs.mkdirSync(path.dirname(full), { recursive: true });
      fs.writeFileSync(full, rel);
    }
  }
}

export function baseConfig(startDir: string, overrides: Partial<OrganizeConfig> = {}): OrganizeConfig {
  return {
    startDir,
    programName: "forg",
    prefix: "",
    verbose: false,
    dryRun: false,
    recursive: false,
    maxDepth: 1,
    ...overrides,
  };
}

export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;]*m/g, "");
}
