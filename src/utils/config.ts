import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import chalk from 'chalk';
import type { Config } from '../types';

// 默认配置文件路径, 可通过 REPO_SHUTTLE_CONFIG 覆盖
const DEFAULT_CONFIG_FILE_PATH = path.join(os.homedir(), '.repo-shuttle', 'config.json');

/**
 * 获取配置文件路径
 */
export function getConfigPath(): string {
  return process.env.REPO_SHUTTLE_CONFIG || DEFAULT_CONFIG_FILE_PATH;
}

/**
 * GitHub API 地址 (GitHub Enterprise 时覆盖)
 */
export function getApiBaseUrl(): string {
  return process.env.REPO_SHUTTLE_API_URL || 'https://api.github.com';
}

/**
 * 推送目标仓库时使用的 git 主机名
 */
export function getGitHost(): string {
  return process.env.REPO_SHUTTLE_GIT_HOST || 'github.com';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// 无原型的对象, 账号名为 "__proto__" 等时同样按普通键存储
function emptyAccounts(): Record<string, string> {
  return Object.create(null);
}

/**
 * 账号存储: 账号名称 -> 个人访问令牌
 * 文件缺失或损坏时视为空, 下次保存时覆盖
 */
export class AccountStore {
  readonly configPath: string;
  private data: Config;

  constructor(configPath: string = getConfigPath()) {
    this.configPath = configPath;
    this.data = this.load();
  }

  private load(): Config {
    if (!fs.existsSync(this.configPath)) {
      return { accounts: emptyAccounts() };
    }

    let raw: unknown;
    try {
      raw = fs.readJsonSync(this.configPath);
    } catch (error) {
      const reason = error instanceof SyntaxError ? 'invalid JSON' : error instanceof Error ? error.message : String(error);
      console.warn(chalk.yellow(`Warning: could not read config file ${this.configPath} (${reason}). Starting with no accounts.`));
      return { accounts: emptyAccounts() };
    }

    if (!isRecord(raw) || (raw.accounts !== undefined && !isRecord(raw.accounts))) {
      console.warn(chalk.yellow(`Warning: invalid config structure in ${this.configPath}. Starting with no accounts.`));
      return { accounts: emptyAccounts() };
    }

    const accounts = emptyAccounts();
    for (const [name, token] of Object.entries(raw.accounts ?? {})) {
      if (typeof token === 'string' && token.length > 0) {
        accounts[name] = token;
      } else {
        console.warn(chalk.yellow(`Warning: ignoring account "${name}" without a valid token`));
      }
    }

    return { accounts };
  }

  /**
   * 写入配置文件
   * @returns 是否写入成功
   */
  save(): boolean {
    try {
      fs.ensureDirSync(path.dirname(this.configPath));
      fs.writeJsonSync(this.configPath, this.data, { spaces: 2 });
      return true;
    } catch (error) {
      console.error(chalk.red('Error saving configuration:'), error instanceof Error ? error.message : error);
      return false;
    }
  }

  /**
   * 添加账号, 同名账号会被覆盖
   * @param name 账号名称
   * @param token 个人访问令牌
   * @returns 是否保存成功
   */
  add(name: string, token: string): boolean {
    this.data.accounts[name] = token;
    return this.save();
  }

  /**
   * 删除账号
   * @returns 账号不存在或保存失败时返回 false
   */
  remove(name: string): boolean {
    if (!this.has(name)) {
      return false;
    }
    delete this.data.accounts[name];
    return this.save();
  }

  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.data.accounts, name);
  }

  get(name: string): string | undefined {
    return this.has(name) ? this.data.accounts[name] : undefined;
  }

  listAll(): Record<string, string> {
    return { ...this.data.accounts };
  }
}

/**
 * 遮蔽令牌, 仅保留首尾各 4 位
 */
export function maskToken(token: string): string {
  return token.length > 8 ? `${token.slice(0, 4)}...${token.slice(-4)}` : '****';
}
