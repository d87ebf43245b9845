import chalk from 'chalk';
import type { CommandContext } from '../utils/context';
import { qualifyRepositoryName } from '../utils/github';
import type { DeleteRepoRequest } from '../types';

/**
 * delete-repo 命令处理函数
 * 未指定 force/yes 时需要确认, 取消不算失败
 * @returns 退出码
 */
export async function deleteRepo(request: DeleteRepoRequest, ctx: CommandContext): Promise<number> {
  try {
    const token = ctx.store.get(request.account);
    if (!token) {
      console.error(chalk.red(`Account '${request.account}' not found in config.`));
      return 1;
    }

    const client = ctx.createClient(token);

    const fullName = await qualifyRepositoryName(request.repo, client);
    if (!fullName.ok) {
      console.error(chalk.red(`Error accessing user information: ${fullName.error}`));
      return 1;
    }

    if (!(await client.repositoryExists(fullName.data))) {
      console.error(chalk.red(`Repository ${fullName.data} not found or not accessible.`));
      return 1;
    }

    if (!request.force && !request.yes) {
      const confirmed = await ctx.confirm(`Are you sure you want to delete ${fullName.data}? This cannot be undone.`);
      if (!confirmed) {
        console.log(chalk.yellow('Deletion cancelled.'));
        return 0;
      }
    }

    const deleted = await client.deleteRepository(fullName.data);
    if (!deleted.ok) {
      console.error(chalk.red(`Failed to delete repository: ${deleted.error}`));
      return 1;
    }

    console.log(chalk.green(`Successfully deleted repository ${fullName.data}`));
    return 0;
  } catch (error) {
    console.error(chalk.red('Unexpected error while deleting repository:'), error);
    return 1;
  }
}
