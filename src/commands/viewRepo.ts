import chalk from 'chalk';
import type { CommandContext } from '../utils/context';
import { qualifyRepositoryName } from '../utils/github';
import type { ContentEntry, ViewRepoRequest } from '../types';

/**
 * 解码文件内容, GitHub 以 base64 返回
 */
export function decodeContent(entry: ContentEntry): string {
  if (entry.content === undefined) return '';
  return entry.encoding === 'base64' ? Buffer.from(entry.content, 'base64').toString('utf8') : entry.content;
}

/**
 * view-repo 命令处理函数: 列出目录或输出文件内容
 */
export async function viewRepo(request: ViewRepoRequest, ctx: CommandContext): Promise<number> {
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

  const contents = await client.listContents(fullName.data, request.path);
  if (!contents.ok) {
    console.error(chalk.red(`Failed to list contents: ${contents.error}`));
    return 1;
  }

  const { data } = contents;
  if (!Array.isArray(data) && data.type === 'file' && data.content !== undefined) {
    console.log(decodeContent(data));
    return 0;
  }

  for (const entry of Array.isArray(data) ? data : [data]) {
    console.log(`${entry.type}  ${entry.name}`);
  }
  return 0;
}
