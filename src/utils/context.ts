import { AccountStore } from './config';
import { GitHubClient, type GitHubClientOptions } from './github';
import { execaGit, type GitOperations } from './git';
import { confirm } from './interactive';

/**
 * 命令执行时依赖的外部能力
 */
export interface CommandContext {
  store: AccountStore;
  createClient: (token: string, options?: GitHubClientOptions) => GitHubClient;
  git: GitOperations;
  confirm: (message: string) => Promise<boolean>;
}

/**
 * 使用真实配置文件、GitHub API、git 与终端交互的上下文
 */
export function createDefaultContext(): CommandContext {
  return {
    store: new AccountStore(),
    createClient: (token, options) => new GitHubClient(token, options),
    git: execaGit,
    confirm,
  };
}
