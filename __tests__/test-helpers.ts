/**
 * 测试辅助工具
 * 临时源码树、console 捕获和测试用补丁计划
 */
import * as fs from "fs";
import * as path from "path";
import { tmpdir } from "os";
import { vi } from "vitest";
import type { PatchPlan, TargetFile } from "../src/types";

const tempDirs: string[] = [];

export function createTempDir(): string {
  const dir = fs.mkdtempSync(path.join(tmpdir(), "mutter-patch-test-"));
  tempDirs.push(dir);
  return dir;
}

export function cleanupTempDirs(): void {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
}

export const MESON_BUILD = [
  "project('mutter', 'c',",
  "  version: '46.2',",
  "  meson_version: '>= 1.1.0',",
  "  license: 'GPLv2+')",
  "",
].join("\n");

/**
 * 创建一个带 meson.build 和 src/wayland 的临时源码树
 */
export function createSourceTree(
  files: Record<string, string | Buffer>,
  options: { mesonBuild?: string | null } = {}
): string {
  const root = createTempDir();
  fs.mkdirSync(path.join(root, "src", "wayland"), { recursive: true });

  const mesonBuild = options.mesonBuild === undefined ? MESON_BUILD : options.mesonBuild;
  if (mesonBuild !== null) {
    fs.writeFileSync(path.join(root, "meson.build"), mesonBuild);
  }

  for (const [relPath, content] of Object.entries(files)) {
    const fullPath = path.join(root, relPath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
  }
  return root;
}

export function readFile(root: string, relPath: string): string {
  return fs.readFileSync(path.join(root, relPath), "utf8");
}

export function exists(root: string, relPath: string): boolean {
  return fs.existsSync(path.join(root, relPath));
}

/**
 * 静默并捕获 console 输出
 */
export function captureConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => {}),
    warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
    error: vi.spyOn(console, "error").mockImplementation(() => {}),
  };
}

/**
 * 用目标文件的锚点拼出一个"原版"文件，锚点之间用不相关的代码隔开
 */
export function buildPristineSource(target: TargetFile): string {
  const parts = ["/* fixture for " + target.path + " */", "#include <glib.h>", ""];
  target.rules.forEach((rule, index) => {
    parts.push(`static void`, `fixture_function_${index} (void)`, `{`, rule.anchor, ``, ``);
  });
  return parts.join("\n");
}

export const ALPHA_PATH = "src/wayland/alpha.c";
export const BETA_PATH = "src/wayland/beta.c";

export const ALPHA_SOURCE = "int a;\nFOCUS_CHECK_A\nint c;\n";
export const ALPHA_PATCHED = "int a;\n/* TEST_PATCH: removed A */\nint c;\n";

export const BETA_SOURCE = "void f (void)\n{\n  FOCUS_CHECK_B\n  notify (focus_list);\n}\n";
export const BETA_PATCHED =
  "void f (void)\n{\n  /* TEST_PATCH: removed B */\n  notify (all_list); /* TEST_PATCH */\n}\n";

export const TEST_PLAN: PatchPlan = {
  project: "mutter",
  version: "46.2",
  marker: "TEST_PATCH",
  rootMarkers: ["meson.build", "src/wayland"],
  signature: { file: "meson.build", contains: "project('mutter'" },
  targets: [
    {
      id: "alpha",
      path: ALPHA_PATH,
      version: "46.2",
      rules: [
        {
          label: "alpha focus check",
          anchor: "FOCUS_CHECK_A",
          replacement: "/* TEST_PATCH: removed A */",
        },
      ],
    },
    {
      id: "beta",
      path: BETA_PATH,
      version: "46.2",
      rules: [
        {
          label: "beta focus check",
          anchor: "FOCUS_CHECK_B",
          replacement: "/* TEST_PATCH: removed B */",
        },
        {
          label: "beta notify",
          anchor: "notify (focus_list);",
          replacement: "notify (all_list); /* TEST_PATCH */",
        },
      ],
    },
  ],
};

export function createTestTree(
  overrides: Record<string, string | Buffer> = {}
): string {
  return createSourceTree({
    [ALPHA_PATH]: ALPHA_SOURCE,
    [BETA_PATH]: BETA_SOURCE,
    ...overrides,
  });
}
