import { Command, InvalidArgumentError } from 'commander';
import { RunController } from './core/run-controller';
import { enhanceError, logError } from './core/error-handler';
import { listSupportedVersions } from './plans';
import type { PatchOptions } from './types';

export interface CliOptions {
  targetVersion?: string;
  dryRun?: boolean;
  restore?: boolean;
  keepBackups?: boolean;
  status?: boolean;
  strictVersion?: boolean;
  backupSuffix?: string;
  maxDiffLines?: number;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function printNextSteps(root: string, controller: RunController): void {
  const { project, version, distroPackages = [] } = controller.plan;
  const packages = distroPackages.join(' ');
  const holdSteps = packages
    ? `
5) Prevent apt from overwriting the patched ${project}:
   sudo apt-mark hold ${packages}
`
    : '';
  const revertPackages = packages
    ? `
To return to the distribution packages:
   sudo apt-mark unhold ${packages}
   sudo apt install --reinstall ${packages}
`
    : '';

  console.log(`
================================================================================
PATCHING COMPLETE (${project} ${version})
================================================================================

Next steps (not run by this tool):

1) Install build dependencies:
   sudo apt build-dep ${project}

2) Build:
   cd ${root}
   meson setup build --prefix=/usr --buildtype=release
   ninja -C build

3) Install (back up your system first):
   sudo ninja -C build install

4) Restart the session (log out and back in, or reboot).
${holdSteps}
To revert the source tree:
   mutter-clipboard-patch --restore ${root}
${revertPackages}`);
}

/**
 * 执行一次命令，返回进程退出码
 */
export function runCli(root: string, cmdOptions: CliOptions = {}): number {
  const options: PatchOptions = {
    targetVersion: cmdOptions.targetVersion,
    dryRun: cmdOptions.dryRun,
    strictVersion: cmdOptions.strictVersion,
    backupSuffix: cmdOptions.backupSuffix,
    maxDiffLines: cmdOptions.maxDiffLines,
  };

  try {
    const controller = new RunController(root, options);

    if (cmdOptions.status) {
      const report = controller.status();
      if (!report.rootRecognized) {
        console.error(`[ERROR] ${report.root} is not a ${controller.plan.project} source tree`);
        return 1;
      }
      console.log(`[info] Status of ${report.root} against ${controller.plan.project} ${report.version}`);
      for (const file of report.files) {
        console.log(`  ${file.filePath}: ${file.condition} (backup: ${file.hasBackup ? 'yes' : 'no'})`);
      }
      console.log(`[info] Backups found: ${report.backups.length ? report.backups.join(', ') : 'none'}`);
      return 0;
    }

    if (cmdOptions.restore) {
      return controller.restoreAll({ keepBackups: cmdOptions.keepBackups }).success ? 0 : 1;
    }

    const summary = controller.run();
    if (summary.success && !controller.config.dryRun) {
      printNextSteps(summary.root, controller);
    }
    return summary.success ? 0 : 1;
  } catch (error) {
    logError(enhanceError(error));
    return 1;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('mutter-clipboard-patch')
    .description('移除 mutter Wayland 剪贴板焦点检查的补丁工具（严格校验，自动备份）')
    .version('1.0.0')
    .argument('<root>', 'mutter 源码树根目录')
    .option('-t, --target-version <version>', `补丁计划对应的上游版本 (可选: ${listSupportedVersions().join(', ')})`)
    .option('-n, --dry-run', '只校验并预览 diff，不备份也不写入')
    .option('-r, --restore', '从备份恢复所有目标文件')
    .option('--keep-backups', '与 --restore 一起使用：恢复后保留备份文件')
    .option('-s, --status', '报告目标文件当前状态和已有备份')
    .option('--strict-version', '检测到的版本与补丁计划不一致时中止')
    .option('--backup-suffix <suffix>', '备份文件后缀 (默认: .bak)')
    .option('--max-diff-lines <n>', '每个文件最多输出的 diff 行数 (默认: 100)', parseInteger)
    .action((root: string, cmdOptions: CliOptions) => {
      process.exitCode = runCli(root, cmdOptions);
    });

  return program;
}
