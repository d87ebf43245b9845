import chalk from 'chalk';
import { copyRepo } from './copyRepo';
import { deleteRepo } from './deleteRepo';
import type { CommandContext } from '../utils/context';
import type { MoveRepoRequest } from '../types';

/**
 * move-repo 命令处理函数: 复制成功后删除源仓库
 * 删除失败时不回滚, 两个账号中都会保留该仓库
 * @returns 退出码
 */
export async function moveRepo(request: MoveRepoRequest, ctx: CommandContext): Promise<number> {
  const copied = await copyRepo(request, ctx);
  if (copied !== 0) {
    console.error(chalk.red('Failed to copy repository. Aborting move operation.'));
    return copied;
  }

  const deleted = await deleteRepo({ repo: request.repo, account: request.source, force: true, yes: true }, ctx);
  if (deleted !== 0) {
    console.warn(chalk.yellow('Warning: Repository was copied but could not be deleted from the source.'));
  }
  return deleted;
}
