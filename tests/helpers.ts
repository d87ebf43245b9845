import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { vi } from 'vitest';
import type { AxiosAdapter } from 'axios';
import { AccountStore } from '../src/utils/config';
import type { CommandContext } from '../src/utils/context';
import type { GitOperations } from '../src/utils/git';
import { GitHubClient, type GitHubClientOptions } from '../src/utils/github';
import type { GitResult } from '../src/types';

export interface FakeRequest {
  method: string;
  url: string;
  body: unknown;
  authorization: string;
  timeout: number | undefined;
}

export interface FakeReply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export const FAKE_API_URL = 'https://api.test';

type Route = FakeReply | ((request: FakeRequest) => FakeReply);

/**
 * 进程内的 GitHub API 替身, 路由键为 "GET /user" 形式
 * 未注册的路由返回 404 Not Found
 */
export class FakeGitHub {
  readonly requests: FakeRequest[] = [];
  private readonly routes = new Map<string, Route>();

  constructor(routes: Record<string, Route> = {}) {
    for (const [key, route] of Object.entries(routes)) {
      this.routes.set(key, route);
    }
  }

  on(key: string, route: Route): this {
    this.routes.set(key, route);
    return this;
  }

  handled(key: string): boolean {
    return this.requests.some((request) => `${request.method} ${request.url}` === key);
  }

  readonly adapter: AxiosAdapter = async (config) => {
    const request: FakeRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      // 分页链接为绝对地址
      url: (config.url ?? '').replace(FAKE_API_URL, ''),
      body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
      authorization: String(config.headers.get('Authorization')),
      timeout: config.timeout,
    };
    this.requests.push(request);

    const route = this.routes.get(`${request.method} ${request.url}`);
    const reply = route === undefined ? { status: 404, data: { message: 'Not Found' } } : typeof route === 'function' ? route(request) : route;
    return { data: reply.data ?? '', status: reply.status, statusText: String(reply.status), headers: reply.headers ?? {}, config };
  };

  client(token: string, options: GitHubClientOptions = {}): GitHubClient {
    return new GitHubClient(token, { ...options, baseUrl: FAKE_API_URL, adapter: this.adapter });
  }
}

export function repoPayload(fullName: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  const [owner, name] = fullName.split('/');
  return {
    full_name: fullName,
    name,
    owner: { login: owner },
    private: false,
    description: null,
    clone_url: `https://github.com/${fullName}.git`,
    default_branch: 'main',
    ...overrides,
  };
}

type Step = keyof GitOperations;

/**
 * 记录调用的 git 替身, 不启动外部进程
 */
export class FakeGit implements GitOperations {
  readonly calls: string[] = [];
  readonly dirs: string[] = [];
  branches: string[] = ['* main', 'remotes/origin/HEAD -> origin/main', 'remotes/origin/main'];
  current = 'main';
  failures: Partial<Record<Step, string>> = {};

  private result(step: Step, output = ''): GitResult {
    const error = this.failures[step];
    return error === undefined ? { ok: true, output } : { ok: false, error };
  }

  async clone(url: string, targetDir: string): Promise<GitResult> {
    this.calls.push(`clone ${url}`);
    this.dirs.push(targetDir);
    return this.result('clone');
  }

  async listBranches(): Promise<GitResult> {
    this.calls.push('branch -a');
    return this.result('listBranches', this.branches.join('\n'));
  }

  async checkout(branch: string): Promise<GitResult> {
    this.calls.push(`checkout ${branch}`);
    const result = this.result('checkout');
    if (result.ok) this.current = branch;
    return result;
  }

  async currentBranch(): Promise<GitResult> {
    this.calls.push('rev-parse --abbrev-ref HEAD');
    return this.result('currentBranch', this.current);
  }

  async addRemote(remoteName: string, url: string): Promise<GitResult> {
    this.calls.push(`remote add ${remoteName} ${url}`);
    return this.result('addRemote');
  }

  async push(remoteName: string, branch: string, _cwd: string, setUpstream: boolean): Promise<GitResult> {
    this.calls.push(`push ${setUpstream ? '-u ' : ''}${remoteName} ${branch}`);
    return this.result('push');
  }

  async pushTags(remoteName: string): Promise<GitResult> {
    this.calls.push(`push --tags ${remoteName}`);
    return this.result('pushTags');
  }
}

/**
 * 捕获 console 输出, 每次调用的参数以空格拼接为一行
 */
export function captureConsole(): string[] {
  const lines: string[] = [];
  const record = (...args: unknown[]) => {
    lines.push(args.map((arg) => (arg instanceof Error ? arg.message : String(arg))).join(' '));
  };
  vi.spyOn(console, 'log').mockImplementation(record);
  vi.spyOn(console, 'warn').mockImplementation(record);
  vi.spyOn(console, 'error').mockImplementation(record);
  return lines;
}

export function tempConfigPath(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'repo-shuttle-test-'));
  return path.join(dir, 'config.json');
}

export interface TestContext extends CommandContext {
  prompts: string[];
}

/**
 * 构造测试用上下文: 每个令牌对应一个 FakeGitHub
 * @param accounts 账号名称 -> 令牌
 * @param apis 令牌 -> API 替身
 * @param answer 确认提示的回答
 */
export function createTestContext(accounts: Record<string, string>, apis: Record<string, FakeGitHub>, git: GitOperations = new FakeGit(), answer = false): TestContext {
  const configPath = tempConfigPath();
  fs.writeJsonSync(configPath, { accounts });
  const prompts: string[] = [];

  return {
    store: new AccountStore(configPath),
    createClient: (token, options) => (apis[token] ?? new FakeGitHub()).client(token, options),
    git,
    confirm: async (message) => {
      prompts.push(message);
      return answer;
    },
    prompts,
  };
}
