/**
 * Patch Applier
 * 先在原始内容上定位全部锚点，确认全部规则都能干净应用后才生成新内容；
 * 写盘只发生一次，文件要么是完整的旧内容，要么是完整的新内容。
 */

import fs from "fs";
import type { PatchRule } from "../types";
import {
  createPatchError,
  PatchFailure,
  type PatchError,
} from "./error-handler";
import {
  findAnchor,
  toPatchErrors,
  validateAnchors,
} from "./sentinel-validator";

export type Replacement = {
  start: number;
  end: number;
  newText: string;
  label: string;
};

export interface AppliedEdit {
  label: string;
  /** 锚点在原始内容中的偏移量 */
  offset: number;
}

export type ReplacementPlanResult =
  | { ok: true; replacements: Replacement[] }
  | { ok: false; errors: PatchError[] };

export type ApplyResult =
  | { ok: true; content: string; applied: AppliedEdit[] }
  | { ok: false; errors: PatchError[] };

/**
 * 在原始内容上定位每条规则，所有位置都基于未修改的内容计算
 */
export function planReplacements(
  content: string,
  rules: readonly PatchRule[],
  filePath?: string
): ReplacementPlanResult {
  const validation = validateAnchors(content, rules);
  if (!validation.valid) {
    return { ok: false, errors: toPatchErrors(validation.failures, filePath) };
  }

  const replacements: Replacement[] = rules.map((rule) => {
    const start = findAnchor(content, rule.anchor);
    return {
      start,
      end: start + rule.anchor.length,
      newText: rule.replacement,
      label: rule.label,
    };
  });

  const errors: PatchError[] = [];
  const ordered = [...replacements].sort((a, b) => a.start - b.start);
  for (let i = 1; i < ordered.length; i++) {
    const previous = ordered[i - 1];
    const current = ordered[i];
    if (current.start < previous.end) {
      errors.push(
        createPatchError("ANCHOR002", [previous.label, current.label], {
          filePath,
          rule: current.label,
        })
      );
    }
  }

  if (errors.length) {
    return { ok: false, errors };
  }

  return { ok: true, replacements };
}

/**
 * 从后向前应用替换，避免位置偏移
 */
export function applyReplacements(
  code: string,
  replacements: readonly Replacement[]
): string {
  if (!replacements.length) return code;
  const ordered = [...replacements].sort((a, b) => b.start - a.start);
  let out = code;
  for (const r of ordered) {
    out = out.slice(0, r.start) + r.newText + out.slice(r.end);
  }
  return out;
}

/**
 * 计算完整的补丁后内容；任何一条规则失败都不返回内容
 */
export function applyRules(
  content: string,
  rules: readonly PatchRule[],
  filePath?: string
): ApplyResult {
  const plan = planReplacements(content, rules, filePath);
  if (!plan.ok) {
    return plan;
  }

  return {
    ok: true,
    content: applyReplacements(content, plan.replacements),
    applied: plan.replacements.map((r) => ({ label: r.label, offset: r.start })),
  };
}

/**
 * 一次性写入完整的新内容
 */
export function commitPatchedContent(filePath: string, content: string): void {
  try {
    fs.writeFileSync(filePath, content, "utf8");
  } catch (error) {
    throw new PatchFailure(
      createPatchError("FILE002", [filePath], {
        filePath,
        originalError: error instanceof Error ? error : new Error(String(error)),
      })
    );
  }
}
