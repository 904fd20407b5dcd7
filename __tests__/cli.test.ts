import path from "path";
import { CommanderError } from "commander";
import { afterEach, describe, expect, test } from "vitest";
import { createProgram, runCli } from "../src/cli";
import { MUTTER_46_2 } from "../src/plans";
import {
  buildPristineSource,
  captureConsole,
  createSourceTree,
  exists,
  readFile,
} from "./test-helpers";

function createMutterTree(): string {
  return createSourceTree(
    Object.fromEntries(
      MUTTER_46_2.targets.map((target) => [target.path, buildPristineSource(target)])
    )
  );
}

function loggedLines(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map(([line]) => String(line));
}

describe("命令行", () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  test("patches a pristine tree and prints the next steps", () => {
    const output = captureConsole();
    const root = createMutterTree();
    const [dataDevice, primary] = MUTTER_46_2.targets;

    expect(runCli(root)).toBe(0);

    expect(readFile(root, dataDevice.path)).toContain("VMWARE_CLIPBOARD_PATCH");
    expect(readFile(root, primary.path)).toContain("VMWARE_CLIPBOARD_PATCH");
    expect(readFile(root, `${dataDevice.path}.bak`)).toBe(buildPristineSource(dataDevice));
    const summary = loggedLines(output.log).find((line) =>
      line.includes("PATCHING COMPLETE (mutter 46.2)")
    );
    expect(summary).toContain("1) Install build dependencies:\n   sudo apt build-dep mutter\n");
    expect(summary).toContain(`   cd ${root}\n`);
    expect(summary).toContain(
      "5) Prevent apt from overwriting the patched mutter:\n   sudo apt-mark hold mutter mutter-common libmutter-14-0\n"
    );
    expect(summary).toContain(
      "   sudo apt install --reinstall mutter mutter-common libmutter-14-0\n"
    );
  });

  test("dry run leaves the tree untouched and skips the next steps", () => {
    const output = captureConsole();
    const root = createMutterTree();
    const [dataDevice] = MUTTER_46_2.targets;

    expect(runCli(root, { dryRun: true })).toBe(0);

    expect(readFile(root, dataDevice.path)).toBe(buildPristineSource(dataDevice));
    expect(exists(root, `${dataDevice.path}.bak`)).toBe(false);
    expect(loggedLines(output.log).some((line) => line.includes("PATCHING COMPLETE"))).toBe(false);
  });

  test("status then restore round trip", () => {
    const output = captureConsole();
    const root = createMutterTree();
    const [dataDevice, primary] = MUTTER_46_2.targets;
    runCli(root);
    output.log.mockClear();

    expect(runCli(root, { status: true })).toBe(0);
    expect(loggedLines(output.log)).toEqual([
      `[info] Status of ${root} against mutter 46.2`,
      `  ${path.join(root, dataDevice.path)}: patched (backup: yes)`,
      `  ${path.join(root, primary.path)}: patched (backup: yes)`,
      `[info] Backups found: ${primary.path}.bak, ${dataDevice.path}.bak`,
    ]);

    expect(runCli(root, { restore: true })).toBe(0);
    expect(readFile(root, dataDevice.path)).toBe(buildPristineSource(dataDevice));
    expect(readFile(root, primary.path)).toBe(buildPristineSource(primary));
    expect(exists(root, `${primary.path}.bak`)).toBe(false);
  });

  test("returns 1 when a file fails", () => {
    captureConsole();
    const root = createMutterTree();
    runCli(root);

    expect(runCli(root)).toBe(1);
  });

  test("returns 1 for a directory that is not a mutter tree", () => {
    const output = captureConsole();
    const root = createSourceTree({}, { mesonBuild: null });

    expect(runCli(root, { status: true })).toBe(1);
    expect(output.error).toHaveBeenCalledWith(`[ERROR] ${root} is not a mutter source tree`);
  });

  test("reports an unknown target version", () => {
    const output = captureConsole();
    const root = createMutterTree();

    expect(runCli(root, { targetVersion: "1.0" })).toBe(1);
    expect(output.error).toHaveBeenCalledWith(
      "[ERROR] [PLAN001] No patch plan for version 1.0\n  Suggestion: Supported versions: 46.2"
    );
  });

  describe("createProgram", () => {
    test("parses options and sets the exit code", () => {
      captureConsole();
      const root = createMutterTree();
      const [dataDevice] = MUTTER_46_2.targets;

      createProgram().parse([root, "--dry-run", "--max-diff-lines", "5"], { from: "user" });

      expect(process.exitCode).toBe(0);
      expect(readFile(root, dataDevice.path)).toBe(buildPristineSource(dataDevice));
    });

    test("rejects a non-integer diff limit", () => {
      const program = createProgram()
        .exitOverride()
        .configureOutput({ writeErr: () => {} });

      let caught: unknown;
      try {
        program.parse(["/tmp/tree", "--max-diff-lines", "many"], { from: "user" });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(CommanderError);
      if (!(caught instanceof CommanderError)) return;
      expect(caught.code).toBe("commander.invalidArgument");
    });
  });
});
