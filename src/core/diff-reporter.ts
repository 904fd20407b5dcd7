/**
 * Diff Reporter
 * 生成补丁前后的逐行对比，供操作者确认。只做展示，不影响成功与否。
 */

import { CONFIG_DEFAULTS } from "../config/config-manager";

type DiffOpType = "equal" | "delete" | "insert";

interface DiffOp {
  type: DiffOpType;
  line: string;
  /** 该操作之前旧内容已消费的行数 */
  aIndex: number;
  /** 该操作之前新内容已消费的行数 */
  bIndex: number;
}

// 超过这个规模的中间段不做 LCS，直接整段删除再整段插入
const MAX_LCS_CELLS = 25_000_000;

/**
 * 按行切分，末尾换行不产生空行
 */
export function splitLines(text: string): string[] {
  if (!text) return [];
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

function computeOps(a: string[], b: string[]): DiffOp[] {
  // 去掉公共前缀和后缀，只对中间段做 LCS
  let prefix = 0;
  while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) {
    prefix++;
  }
  let suffix = 0;
  while (
    suffix < a.length - prefix &&
    suffix < b.length - prefix &&
    a[a.length - 1 - suffix] === b[b.length - 1 - suffix]
  ) {
    suffix++;
  }

  const midA = a.slice(prefix, a.length - suffix);
  const midB = b.slice(prefix, b.length - suffix);
  const types: DiffOpType[] = [];

  for (let i = 0; i < prefix; i++) types.push("equal");
  types.push(...diffMiddle(midA, midB));
  for (let i = 0; i < suffix; i++) types.push("equal");

  const ops: DiffOp[] = [];
  let ai = 0;
  let bi = 0;
  for (const type of types) {
    if (type === "insert") {
      ops.push({ type, line: b[bi], aIndex: ai, bIndex: bi });
      bi++;
    } else {
      ops.push({ type, line: a[ai], aIndex: ai, bIndex: bi });
      ai++;
      if (type === "equal") bi++;
    }
  }
  return ops;
}

function diffMiddle(a: string[], b: string[]): DiffOpType[] {
  const n = a.length;
  const m = b.length;
  const types: DiffOpType[] = [];

  if (n * m > MAX_LCS_CELLS) {
    for (let i = 0; i < n; i++) types.push("delete");
    for (let j = 0; j < m; j++) types.push("insert");
    return types;
  }

  // lcs[i][j] = a[i..] 与 b[j..] 的最长公共子序列长度
  const lcs: Int32Array[] = [];
  for (let i = 0; i <= n; i++) lcs.push(new Int32Array(m + 1));
  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      lcs[i][j] =
        a[i] === b[j]
          ? lcs[i + 1][j + 1] + 1
          : Math.max(lcs[i + 1][j], lcs[i][j + 1]);
    }
  }

  let i = 0;
  let j = 0;
  while (i < n && j < m) {
    if (a[i] === b[j]) {
      types.push("equal");
      i++;
      j++;
    } else if (lcs[i + 1][j] >= lcs[i][j + 1]) {
      types.push("delete");
      i++;
    } else {
      types.push("insert");
      j++;
    }
  }
  for (; i < n; i++) types.push("delete");
  for (; j < m; j++) types.push("insert");
  return types;
}

function formatRange(start: number, length: number): string {
  if (length === 1) return `${start + 1}`;
  if (length === 0) return `${start},0`;
  return `${start + 1},${length}`;
}

/**
 * 生成统一格式的 diff 行；内容相同时返回空数组
 */
export function createUnifiedDiff(
  before: string,
  after: string,
  label: string,
  context: number = CONFIG_DEFAULTS.DIFF_CONTEXT
): string[] {
  const ops = computeOps(splitLines(before), splitLines(after));
  const changes = ops
    .map((op, index) => (op.type === "equal" ? -1 : index))
    .filter((index) => index !== -1);

  if (!changes.length) return [];

  // 相邻改动之间的相同行不超过 2 * context 时合并为同一个 hunk
  const groups: Array<[number, number]> = [];
  let groupStart = changes[0];
  let groupEnd = changes[0];
  for (const index of changes.slice(1)) {
    if (index - groupEnd - 1 <= 2 * context) {
      groupEnd = index;
    } else {
      groups.push([groupStart, groupEnd]);
      groupStart = groupEnd = index;
    }
  }
  groups.push([groupStart, groupEnd]);

  const out = [`--- ${label} (before)`, `+++ ${label} (after)`];
  for (const [first, last] of groups) {
    const hunk = ops.slice(
      Math.max(0, first - context),
      Math.min(ops.length, last + context + 1)
    );
    const aLength = hunk.filter((op) => op.type !== "insert").length;
    const bLength = hunk.filter((op) => op.type !== "delete").length;
    out.push(
      `@@ -${formatRange(hunk[0].aIndex, aLength)} +${formatRange(hunk[0].bIndex, bLength)} @@`
    );
    for (const op of hunk) {
      const sign = op.type === "equal" ? " " : op.type === "delete" ? "-" : "+";
      out.push(sign + op.line);
    }
  }
  return out;
}

/**
 * 输出 diff 预览，返回是否有变化
 */
export function reportDiff(
  before: string,
  after: string,
  label: string,
  options: { maxLines?: number; context?: number } = {}
): boolean {
  const { maxLines = CONFIG_DEFAULTS.MAX_DIFF_LINES, context } = options;
  const diff = createUnifiedDiff(before, after, label, context);
  if (!diff.length) {
    console.log(`[SKIP] ${label}: no changes`);
    return false;
  }

  console.log(`[DIFF] ${label}:`);
  diff.slice(0, maxLines).forEach((line) => console.log(line));
  if (diff.length > maxLines) {
    console.log("  ... (diff truncated)");
  }
  return true;
}
