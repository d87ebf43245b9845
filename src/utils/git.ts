import execa from 'execa';
import type { GitResult } from '../types';

/**
 * 仓库传输所需的 git 能力, 每个步骤一个方法
 * 测试中可替换为不启动外部进程的实现
 */
export interface GitOperations {
  clone(url: string, targetDir: string): Promise<GitResult>;
  listBranches(cwd: string): Promise<GitResult>;
  checkout(branch: string, cwd: string): Promise<GitResult>;
  currentBranch(cwd: string): Promise<GitResult>;
  addRemote(remoteName: string, url: string, cwd: string): Promise<GitResult>;
  push(remoteName: string, branch: string, cwd: string, setUpstream: boolean): Promise<GitResult>;
  pushTags(remoteName: string, cwd: string): Promise<GitResult>;
}

/**
 * 将 URL 中的令牌替换为 ***
 * https://<token>@github.com/... -> https://***@github.com/...
 */
export function redactCredentials(text: string): string {
  return text.replace(/(https?:\/\/)[^/@\s]+@/g, '$1***@');
}

/**
 * 在 URL 中嵌入令牌
 * @param cloneUrl https://github.com/owner/repo.git
 * @param token 个人访问令牌
 */
export function withToken(cloneUrl: string, token: string): string {
  return cloneUrl.replace(/^https:\/\//, `https://${token}@`);
}

/**
 * 判断 `git branch -a` 输出中是否包含指定分支 (本地或 origin 远程跟踪分支)
 * 按完整分支名比较, `feature` 不匹配 `remotes/origin/feature/login`
 */
export function hasBranch(branchListing: string, branch: string): boolean {
  return branchListing
    .split('\n')
    .map((line) => line.trim().replace(/^\*\s*/, '').split(' -> ')[0])
    .filter(Boolean)
    .some((name) => name === branch || name === `remotes/origin/${branch}`);
}

/**
 * 执行 git 命令, 失败时返回 stderr
 * @param args git 参数
 * @param cwd 工作目录
 */
export async function runGit(args: string[], cwd?: string): Promise<GitResult> {
  try {
    const { exitCode, stdout, stderr } = await execa('git', args, { cwd, reject: false });
    if (exitCode === 0) {
      return { ok: true, output: stdout.trim() };
    }
    return { ok: false, error: redactCredentials(`Command failed: ${stderr.trim() || `exit code ${exitCode}`}`) };
  } catch (error) {
    // 例如系统中没有 git
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, error: redactCredentials(`Error executing git command: ${message}`) };
  }
}

/**
 * 基于本机 git 可执行文件的实现
 */
export const execaGit: GitOperations = {
  clone: (url, targetDir) => runGit(['clone', url, targetDir]),
  listBranches: (cwd) => runGit(['branch', '-a'], cwd),
  checkout: (branch, cwd) => runGit(['checkout', branch], cwd),
  currentBranch: (cwd) => runGit(['rev-parse', '--abbrev-ref', 'HEAD'], cwd),
  addRemote: (remoteName, url, cwd) => runGit(['remote', 'add', remoteName, url], cwd),
  push: (remoteName, branch, cwd, setUpstream) => runGit(['push', ...(setUpstream ? ['--set-upstream'] : []), remoteName, branch], cwd),
  pushTags: (remoteName, cwd) => runGit(['push', '--tags', remoteName], cwd),
};
