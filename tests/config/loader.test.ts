import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  DEFAULT_SETTINGS,
  clampDepth,
  loadSettings,
  mergeSettings,
  saveSettings,
} from "../../src/config/loader.js";
import { makeTempDir } from "../helpers.js";

describe("clampDepth", () => {
  it("1 이상 정수는 그대로", () => {
    const warnings: string[] = [];
    expect(clampDepth(4, warnings)).toBe(4);
    expect(warnings).toEqual([]);
  });

  it("1 미만이면 경고 후 1", () => {
    const warnings: string[] = [];
    expect(clampDepth(0, warnings)).toBe(1);
    expect(warnings).toEqual(["Warning: depth must be >= 1, using default"]);
  });

  it("정수가 아니면 경고 후 1", () => {
    const warnings: string[] = [];
    expect(clampDepth(2.5, warnings)).toBe(1);
    expect(warnings).toEqual(["Warning: invalid depth value, using default"]);
  });
});

describe("mergeSettings", () => {
  it("값이 없으면 기본값", () => {
    const warnings: string[] = [];
    expect(mergeSettings(DEFAULT_SETTINGS, undefined, warnings)).toEqual(DEFAULT_SETTINGS);
    expect(warnings).toEqual([]);
  });

  it("올바른 키만 덮어쓴다", () => {
    const warnings: string[] = [];
    const merged = mergeSettings(DEFAULT_SETTINGS, { prefix: "sorted_", recursive: true, depth: 3 }, warnings);

    expect(merged).toEqual({ prefix: "sorted_", verbose: false, dryRun: false, recursive: true, depth: 3 });
    expect(warnings).toEqual([]);
  });

  it("타입이 틀리면 경고하고 기본값 유지", () => {
    const warnings: string[] = [];
    const merged = mergeSettings(DEFAULT_SETTINGS, { verbose: "yes", depth: "2" }, warnings);

    expect(merged).toEqual(DEFAULT_SETTINGS);
    expect(warnings).toEqual([
      'Warning: setting "verbose" must be a boolean, using default',
      'Warning: setting "depth" must be a number, using default',
    ]);
  });

  it("모르는 키는 경고", () => {
    const warnings: string[] = [];
    mergeSettings(DEFAULT_SETTINGS, { colour: true }, warnings);
    expect(warnings).toEqual(['Warning: unknown setting "colour" ignored']);
  });

  it("매핑이 아니면 무시", () => {
    const warnings: string[] = [];
    expect(mergeSettings(DEFAULT_SETTINGS, ["a"], warnings)).toEqual(DEFAULT_SETTINGS);
    expect(warnings).toEqual(["Warning: settings file must contain a mapping, ignoring it"]);
  });

  it("기본값 객체를 변경하지 않는다", () => {
    mergeSettings(DEFAULT_SETTINGS, { prefix: "x_" }, []);
    expect(DEFAULT_SETTINGS.prefix).toBe("");
  });
});

describe("loadSettings", () => {
  let startDir: string;
  let homeDir: string;

  beforeEach(() => {
    startDir = makeTempDir("forg-start-");
    homeDir = makeTempDir("forg-home-");
  });

  afterEach(() => {
    fs.rmSync(startDir, { recursive: true, force: true });
    fs.rmSync(homeDir, { recursive: true, force: true });
  });

  it("파일이 없으면 기본값", () => {
    const loaded = loadSettings(startDir, homeDir);

    expect(loaded.settings).toEqual(DEFAULT_SETTINGS);
    expect(loaded.source).toBeNull();
    expect(loaded.warnings).toEqual([]);
  });

  it("대상 디렉토리의 파일이 홈보다 우선", () => {
    fs.writeFileSync(path.join(startDir, ".forg.yaml"), "prefix: local_\n");
    fs.writeFileSync(path.join(homeDir, ".forg.yaml"), "prefix: home_\nverbose: true\n");

    const loaded = loadSettings(startDir, homeDir);

    expect(loaded.source).toBe(path.join(startDir, ".forg.yaml"));
    expect(loaded.settings.prefix).toBe("local_");
    // 파일 단위로 선택되므로 홈 설정은 섞이지 않음
    expect(loaded.settings.verbose).toBe(false);
  });

  it("대상 디렉토리에 없으면 홈 파일", () => {
    fs.writeFileSync(path.join(homeDir, ".forg.yaml"), "recursive: true\ndepth: 2\n");

    const loaded = loadSettings(startDir, homeDir);

    expect(loaded.source).toBe(path.join(homeDir, ".forg.yaml"));
    expect(loaded.settings.recursive).toBe(true);
    expect(loaded.settings.depth).toBe(2);
  });

  it("depth 0 은 경고 후 1", () => {
    fs.writeFileSync(path.join(startDir, ".forg.yaml"), "depth: 0\n");

    const loaded = loadSettings(startDir, homeDir);

    expect(loaded.settings.depth).toBe(1);
    expect(loaded.warnings).toEqual(["Warning: depth must be >= 1, using default"]);
  });

  it("YAML 파싱 실패 시 경고 후 기본값", () => {
    const filePath = path.join(startDir, ".forg.yaml");
    fs.writeFileSync(filePath, "prefix: [unclosed\n");

    const loaded = loadSettings(startDir, homeDir);

    expect(loaded.settings).toEqual(DEFAULT_SETTINGS);
    expect(loaded.source).toBeNull();
    expect(loaded.warnings).toHaveLength(1);
    expect(loaded.warnings[0].startsWith(`[Config] Failed to parse ${filePath}:`)).toBe(true);
  });

  it("빈 파일은 기본값", () => {
    fs.writeFileSync(path.join(startDir, ".forg.yaml"), "");

    const loaded = loadSettings(startDir, homeDir);

    expect(loaded.settings).toEqual(DEFAULT_SETTINGS);
    expect(loaded.warnings).toEqual([]);
  });

  it("saveSettings 로 쓴 파일을 다시 읽을 수 있다", () => {
    const settings = { prefix: "s_", verbose: true, dryRun: true, recursive: true, depth: 5 };
    saveSettings(path.join(startDir, ".forg.yaml"), settings);

    expect(loadSettings(startDir, homeDir).settings).toEqual(settings);
  });
});
