/**
 * 哨兵校验
 * 确认每条规则的锚点在文件中恰好出现一次。只读，不修改任何内容。
 */

import type { PatchRule } from "../types";
import { createPatchError, type PatchError } from "./error-handler";

export type AnchorFailureKind = "missing" | "ambiguous" | "empty";

export interface AnchorFailure {
  rule: string;
  anchor: string;
  occurrences: number;
  kind: AnchorFailureKind;
}

export interface ValidationResult {
  valid: boolean;
  failures: AnchorFailure[];
}

/**
 * 统计 needle 在 content 中的精确出现次数，重叠的匹配也计入
 */
export function countOccurrences(content: string, needle: string): number {
  if (!needle) return 0;

  let count = 0;
  let from = 0;
  for (;;) {
    const index = content.indexOf(needle, from);
    if (index === -1) break;
    count++;
    from = index + 1;
  }
  return count;
}

/**
 * 返回 needle 第一次出现的位置；空串或未找到时返回 -1
 */
export function findAnchor(content: string, needle: string): number {
  return needle ? content.indexOf(needle) : -1;
}

export function validateAnchors(
  content: string,
  rules: readonly PatchRule[]
): ValidationResult {
  const failures: AnchorFailure[] = [];

  for (const rule of rules) {
    if (!rule.anchor) {
      failures.push({
        rule: rule.label,
        anchor: rule.anchor,
        occurrences: 0,
        kind: "empty",
      });
      continue;
    }

    const occurrences = countOccurrences(content, rule.anchor);
    if (occurrences === 1) continue;

    failures.push({
      rule: rule.label,
      anchor: rule.anchor,
      occurrences,
      kind: occurrences === 0 ? "missing" : "ambiguous",
    });
  }

  return { valid: failures.length === 0, failures };
}

/**
 * 写入后的二次确认：每条规则的替换文本都应出现在新内容中
 * 返回未通过的规则名称；纯删除规则（替换文本为空）无从确认，跳过
 */
export function verifyReplacements(
  content: string,
  rules: readonly PatchRule[]
): string[] {
  return rules
    .filter((rule) => rule.replacement !== "" && !content.includes(rule.replacement))
    .map((rule) => rule.label);
}

/**
 * 把校验失败转换成带错误码的 PatchError
 */
export function toPatchErrors(
  failures: readonly AnchorFailure[],
  filePath?: string
): PatchError[] {
  return failures.map((failure) => {
    const options = {
      filePath,
      rule: failure.rule,
      details: describeAnchor(failure.anchor),
    };

    switch (failure.kind) {
      case "missing":
        return createPatchError("VERSION002", [failure.rule], options);
      case "ambiguous":
        return createPatchError(
          "ANCHOR001",
          [failure.rule, String(failure.occurrences)],
          options
        );
      case "empty":
        return createPatchError("ANCHOR003", [failure.rule], {
          filePath,
          rule: failure.rule,
        });
    }
  });
}

/**
 * 锚点的首行，用于错误详情
 */
export function describeAnchor(anchor: string): string {
  const firstLine = anchor.split("\n").find((line) => line.trim()) ?? "";
  return `anchor begins with: ${JSON.stringify(firstLine.trim())}`;
}
