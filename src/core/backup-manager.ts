/**
 * 备份管理
 * 修改文件前先创建原始副本；已有备份时拒绝覆盖。
 * 备份文件的存在是"上一次运行动过这个文件"的唯一持久记录。
 */

import fs from "fs";
import path from "path";
import { globSync } from "glob";
import type { BackupRecord } from "../types";
import { CONFIG_DEFAULTS } from "../config/config-manager";
import { createPatchError, PatchFailure } from "./error-handler";

export class BackupManager {
  constructor(private readonly suffix: string = CONFIG_DEFAULTS.BACKUP_SUFFIX) {}

  getBackupPath(filePath: string): string {
    return filePath + this.suffix;
  }

  hasBackup(filePath: string): boolean {
    return fs.existsSync(this.getBackupPath(filePath));
  }

  /**
   * 复制文件字节、权限位和时间戳到备份路径
   */
  backup(filePath: string): BackupRecord {
    const backupPath = this.getBackupPath(filePath);
    if (fs.existsSync(backupPath)) {
      throw new PatchFailure(
        createPatchError("BACKUP001", [backupPath], { filePath })
      );
    }

    const stat = fs.statSync(filePath);
    // COPYFILE_EXCL：检查之后若有人抢先创建了备份，这里依然不会覆盖
    fs.copyFileSync(filePath, backupPath, fs.constants.COPYFILE_EXCL);
    fs.chmodSync(backupPath, stat.mode & 0o7777);
    fs.utimesSync(backupPath, stat.atime, stat.mtime);

    if (!fs.readFileSync(backupPath).equals(fs.readFileSync(filePath))) {
      fs.unlinkSync(backupPath);
      throw new PatchFailure(
        createPatchError("BACKUP003", [backupPath], { filePath })
      );
    }

    return { originalPath: filePath, backupPath };
  }

  /**
   * 用备份内容覆盖原文件
   * @param options.discard 恢复成功后删除备份
   */
  restore(
    filePath: string,
    options: { discard?: boolean } = {}
  ): BackupRecord {
    const backupPath = this.getBackupPath(filePath);
    if (!fs.existsSync(backupPath)) {
      throw new PatchFailure(
        createPatchError("BACKUP002", [backupPath], { filePath })
      );
    }

    const stat = fs.statSync(backupPath);
    fs.copyFileSync(backupPath, filePath);
    fs.chmodSync(filePath, stat.mode & 0o7777);

    if (options.discard) {
      fs.unlinkSync(backupPath);
    }

    return { originalPath: filePath, backupPath };
  }

  /**
   * 列出源码树中所有备份文件（相对于 root 的路径，已排序）
   */
  findBackups(root: string): string[] {
    return globSync(`**/*${this.suffix}`, {
      cwd: root,
      nodir: true,
      dot: true,
      ignore: ["**/node_modules/**", "**/.git/**"],
    })
      .map((file) => file.split(path.sep).join("/"))
      .sort();
  }
}
