#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import fs from 'fs-extra';
import path from 'path';
import { addAccount } from './commands/addAccount';
import { listAccounts, removeAccount } from './commands/accountManager';
import { listRepos } from './commands/listRepos';
import { copyRepo } from './commands/copyRepo';
import { deleteRepo } from './commands/deleteRepo';
import { moveRepo } from './commands/moveRepo';
import { viewRepo } from './commands/viewRepo';
import { createDefaultContext, type CommandContext } from './utils/context';

// 获取包信息
const packageJson: { version: string } = fs.readJsonSync(path.join(__dirname, '../package.json'));

/**
 * 执行命令并设置退出码, 未预期的异常统一报告为失败
 */
async function run(handler: (ctx: CommandContext) => number | Promise<number>): Promise<void> {
  try {
    process.exitCode = await handler(createDefaultContext());
  } catch (error) {
    console.error(chalk.red('Unexpected error:'), error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}

const program = new Command();

program.name('repo-shuttle').description('Copy, move and delete GitHub repositories across several accounts').version(packageJson.version);

program
  .command('add-account')
  .description('Add an account with a personal access token')
  .argument('<name>', 'account name')
  .argument('<token>', 'personal access token')
  .action((name: string, token: string) => run((ctx) => addAccount({ name, token }, ctx)));

program
  .command('list-accounts')
  .description('List configured accounts')
  .action(() => run((ctx) => listAccounts(ctx)));

program
  .command('remove-account')
  .description('Remove an account from the config')
  .argument('<name>', 'account name')
  .option('-y, --yes', 'skip the confirmation prompt', false)
  .action((name: string, options: { yes: boolean }) => run((ctx) => removeAccount({ name, yes: options.yes }, ctx)));

program
  .command('list-repos')
  .description('List repositories of every configured account')
  .action(() => run((ctx) => listRepos(ctx)));

program
  .command('copy-repo')
  .description('Copy a repository from one account to another')
  .argument('<repo>', 'repository name (owner/repo or repo)')
  .requiredOption('--source <account>', 'source account name')
  .requiredOption('--dest <account>', 'destination account name')
  .option('--branch <name>', 'branch to copy', 'main')
  .action((repo: string, options: { source: string; dest: string; branch: string }) =>
    run((ctx) => copyRepo({ repo, source: options.source, dest: options.dest, branch: options.branch }, ctx))
  );

program
  .command('delete-repo')
  .description('Delete a repository')
  .argument('<repo>', 'repository name (owner/repo or repo)')
  .requiredOption('--account <account>', 'account name')
  .option('-f, --force', 'delete without confirmation', false)
  .option('-y, --yes', 'assume yes to the confirmation prompt', false)
  .action((repo: string, options: { account: string; force: boolean; yes: boolean }) =>
    run((ctx) => deleteRepo({ repo, account: options.account, force: options.force, yes: options.yes }, ctx))
  );

program
  .command('move-repo')
  .description('Move a repository (copy, then delete the source)')
  .argument('<repo>', 'repository name (owner/repo or repo)')
  .requiredOption('--source <account>', 'source account name')
  .requiredOption('--dest <account>', 'destination account name')
  .option('--branch <name>', 'branch to copy', 'main')
  .action((repo: string, options: { source: string; dest: string; branch: string }) =>
    run((ctx) => moveRepo({ repo, source: options.source, dest: options.dest, branch: options.branch }, ctx))
  );

program
  .command('view-repo')
  .description('List repository contents or print a file')
  .argument('<repo>', 'repository name (owner/repo or repo)')
  .requiredOption('--account <account>', 'account name')
  .option('--path <path>', 'path inside the repository')
  .action((repo: string, options: { account: string; path?: string }) => run((ctx) => viewRepo({ repo, account: options.account, path: options.path }, ctx)));

// 如果没有提供任何命令，显示帮助信息
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red('Unexpected error:'), error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
