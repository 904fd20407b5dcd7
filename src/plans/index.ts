/**
 * 补丁计划表
 * 按上游版本号索引的静态表。支持新版本 = 新增一个条目，已有条目的语义不允许修改。
 */

import type { PatchPlan, PatchRule } from "../types";
import { createPatchError, PatchFailure } from "../core/error-handler";
import { MUTTER_46_2 } from "./mutter-46.2";

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

export const PATCH_PLANS: ReadonlyMap<string, PatchPlan> = new Map(
  [MUTTER_46_2].map((plan) => [plan.version, deepFreeze(plan)])
);

export function listSupportedVersions(): string[] {
  return [...PATCH_PLANS.keys()];
}

export function getPatchPlan(version: string): PatchPlan {
  const plan = PATCH_PLANS.get(version);
  if (!plan) {
    throw new PatchFailure(
      createPatchError("PLAN001", [version, listSupportedVersions().join(", ")])
    );
  }
  return plan;
}

/**
 * 查找某个目标文件的规则
 */
export function lookupRules(
  plan: PatchPlan,
  fileId: string
): readonly PatchRule[] {
  const target = plan.targets.find(
    (candidate) => candidate.id === fileId || candidate.path === fileId
  );
  if (!target) {
    throw new PatchFailure(
      createPatchError("PLAN002", [fileId, `${plan.project} ${plan.version}`])
    );
  }
  return target.rules;
}

export { MUTTER_46_2 };
