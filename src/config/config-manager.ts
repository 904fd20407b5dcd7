/**
 * 配置管理器 - 统一处理用户配置和默认值
 * 将用户传递的原始 options 与内部使用的配置完全分离
 */

import type { PatchOptions } from "../types";
import { createPatchError, PatchFailure } from "../core/error-handler";

/**
 * 默认值常量 - 集中定义所有默认值
 */
export const CONFIG_DEFAULTS = {
  TARGET_VERSION: "46.2",
  BACKUP_SUFFIX: ".bak",
  MAX_DIFF_LINES: 100,
  DIFF_CONTEXT: 3,
  DRY_RUN: false,
  STRICT_VERSION: false,
} as const;

/**
 * 完整的内部配置接口 - 所有配置项都有确定的值
 */
export interface ResolvedConfig {
  targetVersion: string;
  backupSuffix: string;
  maxDiffLines: number;
  diffContext: number;
  dryRun: boolean;
  strictVersion: boolean;
}

const BACKUP_SUFFIX_PATTERN = /^\.[A-Za-z0-9._-]+$/;

/**
 * 配置管理器类
 */
export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private configCache = new Map<string, ResolvedConfig>();

  private constructor() {}

  /**
   * 获取单例实例
   */
  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * 解析用户配置，返回完整的内部配置
   * 非法值抛出 CONFIG001
   */
  resolveConfig(userOptions: PatchOptions = {}): ResolvedConfig {
    const cacheKey = JSON.stringify(userOptions);
    const cached = this.configCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const resolvedConfig = this.buildResolvedConfig(userOptions);
    this.validate(resolvedConfig);
    this.configCache.set(cacheKey, resolvedConfig);
    return resolvedConfig;
  }

  /**
   * 清除配置缓存
   */
  clearCache(): void {
    this.configCache.clear();
  }

  private buildResolvedConfig(userOptions: PatchOptions): ResolvedConfig {
    return {
      targetVersion: userOptions.targetVersion ?? CONFIG_DEFAULTS.TARGET_VERSION,
      backupSuffix: userOptions.backupSuffix ?? CONFIG_DEFAULTS.BACKUP_SUFFIX,
      maxDiffLines: userOptions.maxDiffLines ?? CONFIG_DEFAULTS.MAX_DIFF_LINES,
      diffContext: userOptions.diffContext ?? CONFIG_DEFAULTS.DIFF_CONTEXT,
      dryRun: userOptions.dryRun ?? CONFIG_DEFAULTS.DRY_RUN,
      strictVersion: userOptions.strictVersion ?? CONFIG_DEFAULTS.STRICT_VERSION,
    };
  }

  private validate(config: ResolvedConfig): void {
    if (!config.targetVersion.trim()) {
      this.fail("targetVersion", "must not be empty");
    }

    if (!BACKUP_SUFFIX_PATTERN.test(config.backupSuffix)) {
      this.fail(
        "backupSuffix",
        `${JSON.stringify(config.backupSuffix)} must start with "." and contain only letters, digits, ".", "_" or "-"`
      );
    }

    if (!Number.isInteger(config.maxDiffLines) || config.maxDiffLines < 1) {
      this.fail("maxDiffLines", `${config.maxDiffLines} is not a positive integer`);
    }

    if (!Number.isInteger(config.diffContext) || config.diffContext < 0) {
      this.fail("diffContext", `${config.diffContext} is not a non-negative integer`);
    }
  }

  private fail(option: string, reason: string): never {
    throw new PatchFailure(createPatchError("CONFIG001", [option, reason]));
  }
}

/**
 * 便捷函数
 */
export function resolveConfig(userOptions: PatchOptions = {}): ResolvedConfig {
  return ConfigManager.getInstance().resolveConfig(userOptions);
}
