import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import chalk from 'chalk';
import { hasBranch, redactCredentials, type GitOperations } from './git';
import type { TransferRequest, TransferResult } from '../types';

const DEST_REMOTE = 'dest';

function failed(message: string, warnings: string[]): TransferResult {
  return { success: false, message: redactCredentials(message), warnings };
}

/**
 * 在临时目录中执行 fn, 无论成功、失败或被中断都删除该目录
 * @param fn 使用临时目录的操作
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'repo-shuttle-'));

  // 被中断时先清理, 再以原信号退出
  const onSignal = (signal: NodeJS.Signals) => {
    detach();
    fs.removeSync(dir);
    process.kill(process.pid, signal);
  };
  const detach = () => {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    return await fn(dir);
  } finally {
    detach();
    await fs.remove(dir);
  }
}

/**
 * 将源仓库的分支和标签推送到目标仓库
 * clone -> checkout -> remote add -> push -> push --tags
 * @param request 源/目标 URL (均带令牌) 与期望的分支
 * @param git git 操作实现
 */
export async function transferRepository(request: TransferRequest, git: GitOperations): Promise<TransferResult> {
  const warnings: string[] = [];

  return withTempDir(async (dir) => {
    const cloned = await git.clone(request.sourceUrl, dir);
    if (!cloned.ok) {
      return failed(`Failed to clone repository: ${cloned.error}`, warnings);
    }

    if (request.branch) {
      const branches = await git.listBranches(dir);
      if (branches.ok && hasBranch(branches.output, request.branch)) {
        const checkedOut = await git.checkout(request.branch, dir);
        if (!checkedOut.ok) {
          return failed(`Failed to checkout branch ${request.branch}: ${checkedOut.error}`, warnings);
        }
      } else {
        // 推送的将是 clone 的默认分支
        const warning = `Branch '${request.branch}' not found. Using default branch.`;
        console.warn(chalk.yellow(`Warning: ${warning}`));
        warnings.push(warning);
      }
    }

    const current = await git.currentBranch(dir);
    if (!current.ok || !current.output) {
      return failed('Failed to determine current branch', warnings);
    }
    const branch = current.output;

    const remoteAdded = await git.addRemote(DEST_REMOTE, request.destinationUrl, dir);
    if (!remoteAdded.ok) {
      return failed(`Failed to add remote: ${remoteAdded.error}`, warnings);
    }

    const pushed = await git.push(DEST_REMOTE, branch, dir, true);
    if (!pushed.ok) {
      return failed(`Failed to push to destination: ${pushed.error}`, warnings);
    }

    // 标签推送失败不影响已完成的分支推送
    const tagsPushed = await git.pushTags(DEST_REMOTE, dir);
    if (!tagsPushed.ok) {
      const warning = redactCredentials(`Failed to push tags: ${tagsPushed.error}`);
      console.warn(chalk.yellow(`Warning: ${warning}`));
      warnings.push(warning);
    }

    return { success: true, message: 'Repository copied successfully', resolvedBranch: branch, warnings };
  });
}
