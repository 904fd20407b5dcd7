import { RunController, type RunControllerOptions } from "./core/run-controller";
import type { RunSummary } from "./types";

export * from "./types";
export { RunController, type RunControllerOptions };
export { BackupManager } from "./core/backup-manager";
export {
  applyRules,
  applyReplacements,
  planReplacements,
  commitPatchedContent,
} from "./core/patch-applier";
export {
  countOccurrences,
  validateAnchors,
  verifyReplacements,
} from "./core/sentinel-validator";
export { createUnifiedDiff, reportDiff } from "./core/diff-reporter";
export { checkRoot, detectVersion } from "./core/root-detector";
export {
  createPatchError,
  formatError,
  PatchFailure,
  ErrorCategory,
  ErrorSeverity,
  type PatchError,
} from "./core/error-handler";
export { CONFIG_DEFAULTS, ConfigManager, resolveConfig } from "./config/config-manager";
export { PATCH_PLANS, MUTTER_46_2, getPatchPlan, lookupRules, listSupportedVersions } from "./plans";

/**
 * 对源码树执行一次完整的补丁流程
 */
export function patchSourceTree(
  root: string,
  options: RunControllerOptions = {}
): RunSummary {
  return new RunController(root, options).run();
}

export default patchSourceTree;
