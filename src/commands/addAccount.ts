import chalk from 'chalk';
import type { CommandContext } from '../utils/context';
import type { AddAccountRequest } from '../types';

// 身份检查只用于提示, 不应让命令长时间挂起
const IDENTITY_TIMEOUT_MS = 5_000;

/**
 * 令牌对应的 GitHub 用户已被其他账号使用时给出提示 (不阻止添加)
 */
async function warnOnDuplicateIdentity(request: AddAccountRequest, ctx: CommandContext): Promise<void> {
  const lookup = (token: string) => ctx.createClient(token, { timeout: IDENTITY_TIMEOUT_MS }).getAuthenticatedUser();
  const user = await lookup(request.token);
  if (!user.ok) {
    console.log(chalk.dim(`Could not verify the token's GitHub user: ${user.error}`));
    return;
  }

  for (const [name, token] of Object.entries(ctx.store.listAll())) {
    if (name === request.name) continue;
    const other = await lookup(token);
    if (other.ok && other.data.login === user.data.login) {
      console.warn(chalk.yellow(`Warning: GitHub user '${user.data.login}' is already configured as account '${name}'`));
    }
  }
}

/**
 * add-account 命令处理函数
 * @param request 账号名称与令牌
 * @returns 退出码
 */
export async function addAccount(request: AddAccountRequest, ctx: CommandContext): Promise<number> {
  try {
    const replacing = ctx.store.has(request.name);
    if (!ctx.store.add(request.name, request.token)) {
      console.error(chalk.red(`Failed to add account '${request.name}'`));
      return 1;
    }

    if (replacing) {
      console.warn(chalk.yellow(`Replaced the existing token of account '${request.name}'`));
    }
    console.log(chalk.green(`Added account '${request.name}'`));

    // 账号已保存, 之后的网络请求不影响结果
    await warnOnDuplicateIdentity(request, ctx);
    return 0;
  } catch (error) {
    console.error(chalk.red(`Failed to add account '${request.name}':`), error);
    return 1;
  }
}
