/**
 * Run Controller
 *
 * 每个目标文件独立地走一遍状态机：
 *   INIT → VALIDATING → BACKING_UP → PATCHING → REPORTING → DONE
 * 任一非终止状态都可以进入 FAILED。PATCHING 失败时（此时备份已存在）立即从备份恢复原文件，
 * 保证该文件结束时与开始时逐字节一致。文件之间没有事务，前面已成功的文件不会因后面的失败回滚。
 */

import fs from "fs";
import path from "path";
import {
  FileRunState,
  type FileCondition,
  type FileStatus,
  type PatchOptions,
  type PatchPlan,
  type PatchResult,
  type RestoreResult,
  type RestoreSummary,
  type RunSummary,
  type StatusReport,
  type TargetFile,
} from "../types";
import { resolveConfig, type ResolvedConfig } from "../config/config-manager";
import { getPatchPlan } from "../plans";
import { BackupManager } from "./backup-manager";
import { reportDiff } from "./diff-reporter";
import {
  createPatchError,
  enhanceError,
  ErrorCategory,
  logError,
  type PatchError,
} from "./error-handler";
import {
  applyReplacements,
  commitPatchedContent,
  planReplacements,
  type Replacement,
} from "./patch-applier";
import { checkRoot, type RootCheckResult } from "./root-detector";
import { validateAnchors, verifyReplacements } from "./sentinel-validator";

export interface RunControllerOptions extends PatchOptions {
  /** 直接指定补丁计划；不指定时按 targetVersion 查表 */
  plan?: PatchPlan;
}

type ReadResult = { ok: true; content: string } | { ok: false; error: PatchError };

type PatchOutcome =
  | { ok: true; content: string; rulesApplied: number }
  | { ok: false; errors: PatchError[] };

export class RunController {
  readonly root: string;
  readonly config: ResolvedConfig;
  readonly plan: PatchPlan;
  private readonly backups: BackupManager;

  constructor(root: string, options: RunControllerOptions = {}) {
    const { plan, ...patchOptions } = options;
    this.root = path.resolve(root);
    this.config = resolveConfig(patchOptions);
    this.plan = plan ?? getPatchPlan(this.config.targetVersion);
    this.backups = new BackupManager(this.config.backupSuffix);
  }

  /**
   * 根目录检查，打印检测到的版本；版本不一致时按 strictVersion 决定警告还是中止
   */
  checkRoot(): RootCheckResult {
    const result = checkRoot(this.root, this.plan);
    if (!result.recognized) return result;

    const { detectedVersion } = result;
    if (detectedVersion) {
      console.log(`[info] Detected version: ${detectedVersion}`);
    }

    if (detectedVersion !== this.plan.version) {
      if (this.config.strictVersion) {
        return {
          recognized: false,
          missing: [],
          detectedVersion,
          error: createPatchError("VERSION001", [
            this.describePlan(),
            detectedVersion
              ? `detected version ${detectedVersion}`
              : "version could not be detected",
          ]),
        };
      }
      if (detectedVersion) {
        logError(
          createPatchError("VERSION003", [this.plan.version, detectedVersion])
        );
      }
    }

    console.log(`[OK] Source tree recognized as ${this.describePlan()} layout`);
    return result;
  }

  /**
   * 对计划中的每个文件执行补丁
   */
  run(): RunSummary {
    console.log(`[info] Patch plan: ${this.describePlan()}`);
    console.log(`[info] Source tree: ${this.root}`);

    const rootCheck = this.checkRoot();
    if (!rootCheck.recognized) {
      const errors = rootCheck.error ? [rootCheck.error] : [];
      errors.forEach(logError);
      return {
        root: this.root,
        version: this.plan.version,
        detectedVersion: rootCheck.detectedVersion,
        rootRecognized: false,
        results: [],
        errors,
        success: false,
      };
    }

    const results = this.plan.targets.map((target) => this.runFile(target));
    const errors = results.flatMap((result) => (result.error ? [result.error] : []));
    const failed = results.filter((result) => !result.success).length;

    if (failed) {
      console.error(
        `[ERROR] ${failed} of ${results.length} target files failed`
      );
    } else if (this.config.dryRun) {
      console.log(
        `[OK] All ${results.length} target files validated (dry run, nothing written)`
      );
    } else {
      console.log(`[OK] All ${results.length} target files patched`);
    }

    return {
      root: this.root,
      version: this.plan.version,
      detectedVersion: rootCheck.detectedVersion,
      rootRecognized: true,
      results,
      errors,
      success: failed === 0,
    };
  }

  runFile(target: TargetFile): PatchResult {
    const filePath = path.join(this.root, target.path);
    const label = target.path;
    const result: PatchResult = {
      filePath,
      rulesApplied: 0,
      success: false,
      states: [FileRunState.INIT],
      written: false,
    };
    const enter = (state: FileRunState) => result.states.push(state);
    const fail = (errors: PatchError[]): PatchResult => {
      enter(FileRunState.FAILED);
      errors.forEach(logError);
      result.error = errors[0];
      const layoutMismatch = errors.some(
        (error) =>
          error.category === ErrorCategory.VERSION ||
          error.category === ErrorCategory.ANCHOR
      );
      if (layoutMismatch && target.referenceUrl) {
        console.error(`  Compare against upstream ${target.version}: ${target.referenceUrl}`);
      }
      return result;
    };

    // VALIDATING
    enter(FileRunState.VALIDATING);
    console.log(`[info] Validating ${label}`);
    // 已有备份说明之前的运行动过这个文件，先于锚点校验报告
    if (this.backups.hasBackup(filePath)) {
      return fail([
        createPatchError("BACKUP001", [this.backups.getBackupPath(filePath)], { filePath }),
      ]);
    }
    const read = this.readTarget(filePath);
    if (!read.ok) return fail([read.error]);

    const content = read.content;
    result.originalContent = content;

    // 锚点校验和重叠检查都在备份之前完成
    const planned = planReplacements(content, target.rules, filePath);
    if (!planned.ok) {
      return fail(this.explainFailures(planned.errors, content));
    }
    const { replacements } = planned;
    console.log(`[OK] ${label}: ${target.rules.length} sentinels validated`);

    if (this.config.dryRun) {
      enter(FileRunState.PATCHING);
      result.patchedContent = applyReplacements(content, replacements);
      result.rulesApplied = replacements.length;
      console.log(`[OK] ${label}: ${result.rulesApplied} rules apply cleanly (dry run)`);
      return this.finish(result, label);
    }

    // BACKING_UP
    enter(FileRunState.BACKING_UP);
    try {
      result.backup = this.backups.backup(filePath);
    } catch (error) {
      return fail([enhanceError(error, filePath)]);
    }
    console.log(`[info] Backup: ${result.backup.backupPath}`);

    // PATCHING
    enter(FileRunState.PATCHING);
    const patched = this.patch(filePath, content, replacements, target, result);
    if (!patched.ok) {
      this.rollback(filePath, label, result);
      return fail(patched.errors);
    }
    result.patchedContent = patched.content;
    result.rulesApplied = patched.rulesApplied;
    console.log(`[OK] Patched ${label} (${patched.rulesApplied} rules applied)`);

    return this.finish(result, label);
  }

  /**
   * 运维回滚：用备份恢复所有目标文件并删除备份
   */
  restoreAll(options: { keepBackups?: boolean } = {}): RestoreSummary {
    const rootCheck = checkRoot(this.root, this.plan);
    if (!rootCheck.recognized) {
      if (rootCheck.error) logError(rootCheck.error);
      return { root: this.root, rootRecognized: false, results: [], success: false };
    }

    const results: RestoreResult[] = this.plan.targets.map((target) => {
      const filePath = path.join(this.root, target.path);
      if (!this.backups.hasBackup(filePath)) {
        console.log(`[SKIP] ${target.path}: no backup`);
        return { filePath, restored: false };
      }

      try {
        const record = this.backups.restore(filePath, {
          discard: !options.keepBackups,
        });
        console.log(`[OK] Restored ${target.path} from ${record.backupPath}`);
        return { filePath, restored: true };
      } catch (error) {
        const patchError = enhanceError(error, filePath);
        logError(patchError);
        return { filePath, restored: false, error: patchError };
      }
    });

    return {
      root: this.root,
      rootRecognized: true,
      results,
      success: results.every((result) => !result.error),
    };
  }

  /**
   * 只读地报告每个目标文件当前的状态
   */
  status(): StatusReport {
    const rootCheck = checkRoot(this.root, this.plan);
    const files: FileStatus[] = rootCheck.recognized
      ? this.plan.targets.map((target) => {
          const filePath = path.join(this.root, target.path);
          return {
            filePath,
            condition: this.classify(filePath, target),
            hasBackup: this.backups.hasBackup(filePath),
          };
        })
      : [];

    return {
      root: this.root,
      version: this.plan.version,
      rootRecognized: rootCheck.recognized,
      detectedVersion: rootCheck.detectedVersion,
      files,
      backups: rootCheck.recognized ? this.backups.findBackups(this.root) : [],
    };
  }

  private finish(result: PatchResult, label: string): PatchResult {
    result.states.push(FileRunState.REPORTING);
    if (result.originalContent !== undefined && result.patchedContent !== undefined) {
      try {
        reportDiff(result.originalContent, result.patchedContent, label, {
          maxLines: this.config.maxDiffLines,
          context: this.config.diffContext,
        });
      } catch (error) {
        // 预览失败不影响结果
        console.warn(
          `[WARN] Diff preview unavailable for ${label}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
    result.states.push(FileRunState.DONE);
    result.success = true;
    return result;
  }

  /**
   * 计算新内容、整体写入一次，再读回确认
   */
  private patch(
    filePath: string,
    content: string,
    replacements: readonly Replacement[],
    target: TargetFile,
    result: PatchResult
  ): PatchOutcome {
    const patchedContent = applyReplacements(content, replacements);

    try {
      commitPatchedContent(filePath, patchedContent);
    } catch (error) {
      return { ok: false, errors: [enhanceError(error, filePath)] };
    }
    result.written = true;

    const onDisk = this.readTarget(filePath);
    if (!onDisk.ok) return { ok: false, errors: [onDisk.error] };

    const unverified = verifyReplacements(onDisk.content, target.rules);
    if (onDisk.content !== patchedContent || unverified.length) {
      return {
        ok: false,
        errors: [
          createPatchError("FILE005", [filePath], {
            filePath,
            details: unverified.length
              ? `replacement missing for: ${unverified.join("; ")}`
              : "content on disk differs from the computed buffer",
          }),
        ],
      };
    }

    return { ok: true, content: patchedContent, rulesApplied: replacements.length };
  }

  /**
   * PATCHING 失败后的恢复；恢复本身失败时保留备份并报告
   */
  private rollback(filePath: string, label: string, result: PatchResult): void {
    try {
      this.backups.restore(filePath, { discard: true });
      result.written = false;
      result.backup = undefined;
      console.log(`[info] Restored ${label} from backup`);
    } catch (error) {
      logError(enhanceError(error, filePath));
    }
  }

  private readTarget(filePath: string): ReadResult {
    if (!fs.existsSync(filePath)) {
      return {
        ok: false,
        error: createPatchError("FILE003", [filePath, this.describePlan()], { filePath }),
      };
    }

    let bytes: Buffer;
    try {
      bytes = fs.readFileSync(filePath);
    } catch (error) {
      return {
        ok: false,
        error: createPatchError("FILE001", [filePath], {
          filePath,
          originalError: error instanceof Error ? error : new Error(String(error)),
        }),
      };
    }

    try {
      // fatal：非法 UTF-8 直接拒绝，避免解码再编码时改变字节
      const content = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
      return { ok: true, content };
    } catch (error) {
      return {
        ok: false,
        error: createPatchError("FILE004", [filePath], {
          filePath,
          originalError: error instanceof Error ? error : new Error(String(error)),
        }),
      };
    }
  }

  /**
   * 文件已带补丁标记时，补充"似乎已经打过补丁"的提示
   */
  private explainFailures(errors: PatchError[], content: string): PatchError[] {
    if (!content.includes(this.plan.marker)) return errors;
    return errors.map((error) => ({
      ...error,
      suggestion: `The file already contains the ${this.plan.marker} marker and appears to be patched. Restore it from its backup before re-running.`,
    }));
  }

  private classify(filePath: string, target: TargetFile): FileCondition {
    const read = this.readTarget(filePath);
    if (!read.ok) return read.error.code === "FILE003" ? "missing" : "unknown";
    if (validateAnchors(read.content, target.rules).valid) return "pristine";
    if (
      read.content.includes(this.plan.marker) &&
      verifyReplacements(read.content, target.rules).length === 0
    ) {
      return "patched";
    }
    return "unknown";
  }

  private describePlan(): string {
    return `${this.plan.project} ${this.plan.version}`;
  }
}
