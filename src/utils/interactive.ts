import inquirer from 'inquirer';

/**
 * 在终端中询问是/否, 直接回车视为 "否"
 * 删除仓库和账号前使用
 */
export async function confirm(message: string): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([{ type: 'confirm', name: 'confirmed', message, default: false }]);
  return confirmed;
}
