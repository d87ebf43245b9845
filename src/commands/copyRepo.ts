import chalk from 'chalk';
import { getGitHost } from '../utils/config';
import type { CommandContext } from '../utils/context';
import { withToken } from '../utils/git';
import { GitHubClient, qualifyRepositoryName } from '../utils/github';
import { transferRepository } from '../utils/transfer';
import type { ApiResult, CopyRepoRequest, RepositoryDescriptor } from '../types';

/**
 * 目标仓库总是与源仓库同名: {目标用户}/{源仓库名}
 * @param destLogin 目标账号的 GitHub 用户名
 * @param source 源仓库
 */
export function destinationFullName(destLogin: string, source: RepositoryDescriptor): string {
  return `${destLogin}/${source.name}`;
}

/**
 * 目标仓库不存在时创建, 可见性与描述沿用源仓库
 */
async function ensureDestination(client: GitHubClient, fullName: string, source: RepositoryDescriptor): Promise<ApiResult<void>> {
  const lookup = await client.getRepository(fullName);
  if (lookup.kind === 'found') {
    console.log(chalk.blue(`Destination repo ${fullName} already exists`));
    return { ok: true, data: undefined };
  }
  if (lookup.kind === 'transport-error') {
    console.warn(chalk.yellow(`Could not check destination repo ${fullName}: ${lookup.diagnostic}`));
  }

  const created = await client.createRepository({ name: source.name, private: source.private, description: source.description });
  switch (created.kind) {
    case 'created':
      console.log(chalk.green(`Created destination repo ${fullName}`));
      return { ok: true, data: undefined };
    case 'already-exists':
      console.log(chalk.blue(`Destination repo ${fullName} already exists`));
      return { ok: true, data: undefined };
    case 'error':
      return { ok: false, error: created.diagnostic };
  }
}

/**
 * copy-repo 命令处理函数
 * @param request 仓库、源账号、目标账号与分支
 * @returns 退出码
 */
export async function copyRepo(request: CopyRepoRequest, ctx: CommandContext): Promise<number> {
  try {
    const sourceToken = ctx.store.get(request.source);
    const destToken = ctx.store.get(request.dest);
    if (!sourceToken || !destToken) {
      console.error(chalk.red('Source or destination account not found in config.'));
      return 1;
    }

    const sourceClient = ctx.createClient(sourceToken);
    const destClient = ctx.createClient(destToken);

    const sourceName = await qualifyRepositoryName(request.repo, sourceClient);
    if (!sourceName.ok) {
      console.error(chalk.red(`Error accessing source account: ${sourceName.error}`));
      return 1;
    }

    const lookup = await sourceClient.getRepository(sourceName.data);
    if (lookup.kind === 'not-found') {
      console.error(chalk.red(`Error accessing source repository ${sourceName.data}: not found`));
      return 1;
    }
    if (lookup.kind === 'transport-error') {
      console.error(chalk.red(`Error accessing source repository ${sourceName.data}: ${lookup.diagnostic}`));
      return 1;
    }
    const source = lookup.repository;

    const destUser = await destClient.getAuthenticatedUser();
    if (!destUser.ok) {
      console.error(chalk.red(`Error accessing destination account: ${destUser.error}`));
      return 1;
    }

    const destFullName = destinationFullName(destUser.data.login, source);
    if (destFullName.toLowerCase() === source.fullName.toLowerCase()) {
      console.error(chalk.red(`Source and destination are the same repository (${destFullName})`));
      return 1;
    }

    const destination = await ensureDestination(destClient, destFullName, source);
    if (!destination.ok) {
      console.error(chalk.red(`Failed to create destination repo: ${destination.error}`));
      return 1;
    }

    const gitHost = getGitHost();
    const sourceCloneUrl = source.cloneUrl || `https://${gitHost}/${source.fullName}.git`;
    console.log(chalk.blue(`Copying ${source.fullName} to ${destFullName}...`));

    const result = await transferRepository(
      {
        sourceUrl: withToken(sourceCloneUrl, sourceToken),
        destinationUrl: withToken(`https://${gitHost}/${destFullName}.git`, destToken),
        branch: request.branch,
      },
      ctx.git
    );

    if (!result.success) {
      console.error(chalk.red(`Failed to copy repository: ${result.message}`));
      return 1;
    }

    console.log(chalk.green(`Copied ${source.fullName} to ${destFullName} on branch ${result.resolvedBranch}`));
    return 0;
  } catch (error) {
    console.error(chalk.red('Unexpected error while copying repository:'), error);
    return 1;
  }
}
