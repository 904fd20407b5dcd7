/**
 * 源码树识别
 * 在动任何文件之前确认根目录确实是预期的上游项目，并尽量读出其版本号
 */

import childProcess from "child_process";
import fs from "fs";
import path from "path";
import type { PatchPlan } from "../types";
import { createPatchError, type PatchError } from "./error-handler";

export interface RootCheckResult {
  recognized: boolean;
  /** 缺失的标记（文件、目录或签名） */
  missing: string[];
  detectedVersion?: string;
  error?: PatchError;
}

// \b 排除 meson_version
const MESON_VERSION_PATTERN = /\bversion\s*:\s*'([^']+)'/;

type TextRead = { ok: true; content: string } | { ok: false; reason: string };

function readText(file: string): TextRead {
  try {
    return { ok: true, content: fs.readFileSync(file, "utf8") };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * git 检出时取精确匹配的 tag
 */
function describeGitTag(root: string): string | undefined {
  if (!fs.existsSync(path.join(root, ".git"))) return undefined;

  const result = childProcess.spawnSync("git", ["describe", "--tags", "--exact-match"], {
    cwd: root,
    encoding: "utf8",
    timeout: 5000,
  });
  if (result.error || result.status !== 0) return undefined;

  const tag = result.stdout.trim();
  return tag || undefined;
}

/**
 * 读取源码树版本：先看 git tag，再看 meson.build 的 project() 声明
 */
export function detectVersion(root: string, plan: PatchPlan): string | undefined {
  const tag = describeGitTag(root);
  if (tag) return tag;

  const buildFile = path.join(root, plan.signature.file);
  if (!fs.existsSync(buildFile)) return undefined;

  const read = readText(buildFile);
  if (!read.ok) return undefined;
  const match = read.content.match(MESON_VERSION_PATTERN);
  return match ? match[1] : undefined;
}

export function checkRoot(root: string, plan: PatchPlan): RootCheckResult {
  const missing: string[] = [];

  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    missing.push(`${root} is not a directory`);
  } else {
    for (const marker of plan.rootMarkers) {
      if (!fs.existsSync(path.join(root, marker))) {
        missing.push(marker);
      }
    }

    const signatureFile = path.join(root, plan.signature.file);
    if (fs.existsSync(signatureFile)) {
      const read = readText(signatureFile);
      if (!read.ok) {
        missing.push(`readable ${plan.signature.file} (${read.reason})`);
      } else if (!read.content.includes(plan.signature.contains)) {
        missing.push(
          `${plan.signature.file} does not contain ${JSON.stringify(plan.signature.contains)}`
        );
      }
    }
  }

  if (missing.length) {
    return {
      recognized: false,
      missing,
      error: createPatchError("VERSION001", [
        `${plan.project} ${plan.version}`,
        `missing ${missing.join(", ")}`,
      ]),
    };
  }

  return { recognized: true, missing, detectedVersion: detectVersion(root, plan) };
}
