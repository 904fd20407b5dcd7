import type { PatchError } from "./core/error-handler";

/**
 * 单条补丁规则：锚点文本必须在原文件中恰好出现一次
 * A single edit: the anchor must occur exactly once in the pristine file.
 */
export interface PatchRule {
  /** 人类可读的规则名称，出现在日志和错误中 */
  readonly label: string;
  /** 精确匹配的锚点文本（非正则） */
  readonly anchor: string;
  /** 替换后的文本 */
  readonly replacement: string;
}

/**
 * 需要打补丁的目标文件
 */
export interface TargetFile {
  /** 稳定的文件标识，例如 "data-device" */
  readonly id: string;
  /** 相对于源码根目录的路径 */
  readonly path: string;
  /** 该规则集对应的上游版本 */
  readonly version: string;
  /** 按顺序排列的补丁规则 */
  readonly rules: readonly PatchRule[];
  /** 上游对应文件的参考链接 */
  readonly referenceUrl?: string;
}

/**
 * 项目签名：某个文件中必须包含的文本，用于识别上游项目
 */
export interface ProjectSignature {
  readonly file: string;
  readonly contains: string;
}

/**
 * 某个上游版本的完整补丁计划
 */
export interface PatchPlan {
  /** 上游项目名称 */
  readonly project: string;
  /** 上游版本号 */
  readonly version: string;
  /** 写入补丁注释中的标记，用于识别已打过补丁的文件 */
  readonly marker: string;
  /** 根目录下必须存在的文件或目录 */
  readonly rootMarkers: readonly string[];
  readonly signature: ProjectSignature;
  readonly targets: readonly TargetFile[];
  /** 发行版中提供该项目的软件包，安装补丁版后需要锁定 */
  readonly distroPackages?: readonly string[];
}

/**
 * 备份记录，只有备份成功后才存在
 */
export interface BackupRecord {
  originalPath: string;
  backupPath: string;
}

/**
 * 单个文件在一次运行中经历的状态
 */
export enum FileRunState {
  INIT = "INIT",
  VALIDATING = "VALIDATING",
  BACKING_UP = "BACKING_UP",
  PATCHING = "PATCHING",
  REPORTING = "REPORTING",
  DONE = "DONE",
  FAILED = "FAILED",
}

/**
 * 单个文件的补丁结果
 */
export interface PatchResult {
  filePath: string;
  /** 成功应用的规则数量（失败时为 0） */
  rulesApplied: number;
  success: boolean;
  error?: PatchError;
  /** 状态迁移历史，按发生顺序排列 */
  states: FileRunState[];
  /** 是否已写入磁盘（dry run 时为 false） */
  written: boolean;
  backup?: BackupRecord;
  originalContent?: string;
  patchedContent?: string;
}

/**
 * 整个运行的汇总结果
 */
export interface RunSummary {
  root: string;
  version: string;
  detectedVersion?: string;
  /** 根目录检查是否通过；未通过时 results 为空 */
  rootRecognized: boolean;
  results: PatchResult[];
  errors: PatchError[];
  success: boolean;
}

/**
 * 回滚结果
 */
export interface RestoreResult {
  filePath: string;
  restored: boolean;
  error?: PatchError;
}

export interface RestoreSummary {
  root: string;
  rootRecognized: boolean;
  results: RestoreResult[];
  success: boolean;
}

/**
 * 目标文件当前所处的状态
 */
export type FileCondition = "pristine" | "patched" | "unknown" | "missing";

export interface FileStatus {
  filePath: string;
  condition: FileCondition;
  hasBackup: boolean;
}

export interface StatusReport {
  root: string;
  version: string;
  rootRecognized: boolean;
  detectedVersion?: string;
  files: FileStatus[];
  /** 在源码树中找到的所有备份文件（相对路径） */
  backups: string[];
}

/**
 * Options accepted by the patcher.
 * 补丁工具的配置选项。
 */
export interface PatchOptions {
  /**
   * The upstream version whose patch plan is used.
   * Default is "46.2".
   * 使用哪个上游版本的补丁计划，默认 "46.2"。
   */
  targetVersion?: string;

  /**
   * Suffix appended to a file path to form its backup path.
   * Default is ".bak".
   * 备份文件后缀，默认 ".bak"。
   */
  backupSuffix?: string;

  /**
   * Maximum number of diff lines printed per file.
   * Default is 100.
   * 每个文件最多输出的 diff 行数。
   */
  maxDiffLines?: number;

  /**
   * Number of unchanged context lines around each diff hunk.
   * Default is 3.
   */
  diffContext?: number;

  /**
   * Validate and preview only; never back up or write.
   * 只校验和预览，不备份也不写入。
   */
  dryRun?: boolean;

  /**
   * Abort when the detected upstream version differs from the plan.
   * 检测到的版本与补丁计划不一致时直接中止。
   */
  strictVersion?: boolean;
}
