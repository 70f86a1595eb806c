/**
 * 하위 디렉토리를 읽지 못해도 탐색이 계속되는지 검증
 * root 권한에서는 chmod 로 재현이 안 되므로 readdirSync 를 감싼다.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { collect } from "../../src/organizer/traversal.js";
import { runOrganizer, hasErrors } from "../../src/organizer/organizer.js";
import { baseConfig, createTree, makeTempDir } from "../helpers.js";

const { failingDirs } = vi.hoisted(() => ({ failingDirs: new Set<string>() }));

vi.mock("fs", async (importOriginal) => {
  const actual = await importOriginal<typeof import("fs")>();
  return {
    ...actual,
    readdirSync: (dir: string, options: { withFileTypes: true }) => {
      if (failingDirs.has(dir)) {
        throw new Error(`EACCES: permission denied, scandir '${dir}'`);
      }
      return actual.readdirSync(dir, options);
    },
  };
});

describe("읽을 수 없는 하위 디렉토리", () => {
  let root: string;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    root = makeTempDir();
    createTree(root, ["top.txt", "locked/secret.txt", "open/song.mp3"]);
    failingDirs.add(path.join(root, "locked"));
  });

  afterEach(() => {
    failingDirs.clear();
    vi.restoreAllMocks();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("오류를 기록하고 형제 디렉토리는 계속 탐색", () => {
    const result = collect(baseConfig(root, { recursive: true, maxDepth: 2 }));
    const names = result.candidates.map((c) => path.basename(c.sourcePath)).sort();

    expect(names).toEqual(["song.mp3", "top.txt"]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].path).toBe(path.join(root, "locked"));
    expect(result.errors[0].kind).toBe("directory-read");
  });

  it("리포트에 탐색 오류가 남고 실패로 판정", () => {
    const report = runOrganizer(baseConfig(root, { recursive: true, maxDepth: 2, dryRun: true }));

    expect(report.totalCandidates).toBe(2);
    expect(report.erroredCount).toBe(0);
    expect(report.traversalErrors).toHaveLength(1);
    expect(report.traversalErrors[0]).toContain(path.join(root, "locked"));
    expect(hasErrors(report)).toBe(true);
  });
});
