import chalk from 'chalk';
import { maskToken } from '../utils/config';
import type { CommandContext } from '../utils/context';
import type { RemoveAccountRequest } from '../types';

/**
 * 列出所有账号 (令牌已遮蔽)
 */
export function listAccounts(ctx: CommandContext): number {
  const accounts = Object.entries(ctx.store.listAll());

  if (accounts.length === 0) {
    console.log(chalk.yellow('No accounts configured yet.'));
    return 0;
  }

  console.log(chalk.blue(`Configured accounts (${ctx.store.configPath}):`));
  for (const [name, token] of accounts) {
    console.log(`  ${name}: ${maskToken(token)}`);
  }
  return 0;
}

/**
 * 删除账号
 * @param request 账号名称, yes 为 true 时跳过确认
 */
export async function removeAccount(request: RemoveAccountRequest, ctx: CommandContext): Promise<number> {
  try {
    if (!ctx.store.has(request.name)) {
      console.error(chalk.red(`Account '${request.name}' not found in config.`));
      return 1;
    }

    if (!request.yes) {
      const confirmed = await ctx.confirm(`Are you sure you want to delete account '${request.name}'?`);
      if (!confirmed) {
        console.log(chalk.yellow('Account removal cancelled.'));
        return 0;
      }
    }

    if (!ctx.store.remove(request.name)) {
      console.error(chalk.red(`Failed to delete account '${request.name}'`));
      return 1;
    }

    console.log(chalk.green(`Account '${request.name}' deleted.`));
    return 0;
  } catch (error) {
    console.error(chalk.red('Error while removing account:'), error);
    return 1;
  }
}
