import chalk from 'chalk';
import type { CommandContext } from '../utils/context';

/**
 * 依次列出每个账号的仓库
 * 单个账号失败不影响其余账号, 至少一个账号成功时返回 0
 */
export async function listRepos(ctx: CommandContext): Promise<number> {
  const accounts = Object.entries(ctx.store.listAll());
  if (accounts.length === 0) {
    console.error(chalk.red('No accounts configured. Use add-account to add an account.'));
    return 1;
  }

  let success = false;
  for (const [name, token] of accounts) {
    console.log(chalk.blue(`Account: ${name}`));

    const repos = await ctx.createClient(token).listRepositories();
    if (!repos.ok) {
      console.log(chalk.red(`  Error fetching repositories: ${repos.error}`));
      continue;
    }

    success = true;
    for (const repo of repos.data) {
      console.log(`  - ${repo.fullName}`);
    }
  }

  return success ? 0 : 1;
}
