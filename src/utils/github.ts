import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import chalk from 'chalk';
import { getApiBaseUrl } from './config';
import type {
  ApiResult,
  AuthenticatedUser,
  ContentEntry,
  ContentType,
  CreateRepositoryInput,
  CreateRepositoryResult,
  RepositoryDescriptor,
  RepositoryLookup,
} from '../types';

export interface GitHubClientOptions {
  baseUrl?: string;
  /** 请求超时 (毫秒), 未设置时不限时 */
  timeout?: number;
  adapter?: AxiosAdapter;
}

type RawResponse = { ok: true; response: AxiosResponse<unknown> } | { ok: false; error: string };

const CONTENT_TYPES: ContentType[] = ['file', 'dir', 'symlink', 'submodule'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function preview(data: unknown): string {
  const text = typeof data === 'string' ? data : JSON.stringify(data) ?? '';
  return `${text.slice(0, 100)}...`;
}

function invalidBody(data: unknown): string {
  return `Invalid JSON response: ${preview(data)}`;
}

/**
 * 从错误响应中提取诊断信息
 */
function httpDiagnostic(response: AxiosResponse<unknown>): string {
  const message = isRecord(response.data) ? stringField(response.data.message) : '';
  return `HTTP ${response.status}: ${message || response.statusText || 'request failed'}`;
}

/**
 * GitHub 在 404 时返回 {"message": "Not Found"}
 */
function isNotFound(response: AxiosResponse<unknown>): boolean {
  if (response.status === 404) return true;
  return isRecord(response.data) && stringField(response.data.message).toLowerCase().startsWith('not found');
}

/**
 * 422 且错误信息包含 "already exists" 时表示同名仓库已存在
 */
function isNameTaken(response: AxiosResponse<unknown>): boolean {
  if (response.status !== 422 || !isRecord(response.data)) return false;
  const messages = [stringField(response.data.message)];
  if (Array.isArray(response.data.errors)) {
    for (const entry of response.data.errors) {
      messages.push(isRecord(entry) ? stringField(entry.message) : stringField(entry));
    }
  }
  return messages.some((message) => message.toLowerCase().includes('already exists'));
}

/**
 * 从 Link 响应头中取出下一页地址
 * <https://api.github.com/user/repos?page=2>; rel="next", <...>; rel="last"
 */
function nextPageUrl(response: AxiosResponse<unknown>): string | undefined {
  const link: unknown = response.headers['link'];
  if (typeof link !== 'string') return undefined;
  return /<([^>]+)>;\s*rel="next"/.exec(link)?.[1];
}

function toRepositoryDescriptor(data: unknown): RepositoryDescriptor | null {
  if (!isRecord(data) || typeof data.full_name !== 'string' || typeof data.name !== 'string') {
    return null;
  }
  const owner = isRecord(data.owner) ? stringField(data.owner.login) : '';
  return {
    fullName: data.full_name,
    name: data.name,
    ownerLogin: owner || data.full_name.split('/')[0],
    private: data.private === true,
    description: stringField(data.description),
    cloneUrl: stringField(data.clone_url),
    defaultBranch: stringField(data.default_branch, 'main'),
  };
}

function toContentEntry(data: unknown): ContentEntry | null {
  if (!isRecord(data) || typeof data.name !== 'string') {
    return null;
  }
  const type = CONTENT_TYPES.find((candidate) => candidate === data.type) ?? 'file';
  const entry: ContentEntry = {
    name: data.name,
    path: stringField(data.path, data.name),
    type,
    size: typeof data.size === 'number' ? data.size : 0,
  };
  if (typeof data.content === 'string') entry.content = data.content;
  if (typeof data.encoding === 'string') entry.encoding = data.encoding;
  return entry;
}

/**
 * 单个账号的 GitHub REST API 客户端
 * 所有方法都返回结果值, 不抛出异常
 */
export class GitHubClient {
  private readonly http: AxiosInstance;

  constructor(token: string, options: GitHubClientOptions = {}) {
    this.http = axios.create({
      baseURL: options.baseUrl ?? getApiBaseUrl(),
      headers: {
        Authorization: `token ${token}`,
        Accept: 'application/vnd.github.v3+json',
        'User-Agent': 'repo-shuttle',
      },
      // 状态码由调用方自行解释
      validateStatus: () => true,
      ...(options.timeout ? { timeout: options.timeout } : {}),
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  private async send(method: 'GET' | 'POST' | 'DELETE', url: string, data?: unknown): Promise<RawResponse> {
    try {
      const response = await this.http.request<unknown>({ method, url, data });
      return { ok: true, response };
    } catch (error) {
      return { ok: false, error: `Request failed: ${error instanceof Error ? error.message : String(error)}` };
    }
  }

  /**
   * 获取令牌对应的用户
   */
  async getAuthenticatedUser(): Promise<ApiResult<AuthenticatedUser>> {
    const result = await this.send('GET', '/user');
    if (!result.ok) return result;

    const { response } = result;
    if (!isSuccess(response.status)) {
      return { ok: false, error: httpDiagnostic(response) };
    }
    if (!isRecord(response.data) || typeof response.data.login !== 'string') {
      return { ok: false, error: invalidBody(response.data) };
    }
    return { ok: true, data: { login: response.data.login, id: typeof response.data.id === 'number' ? response.data.id : 0 } };
  }

  /**
   * 列出已认证用户可访问的仓库, 按 Link 响应头依次读取所有分页
   */
  async listRepositories(): Promise<ApiResult<RepositoryDescriptor[]>> {
    const repositories: RepositoryDescriptor[] = [];
    let url: string | undefined = '/user/repos?per_page=100';

    while (url) {
      const result = await this.send('GET', url);
      if (!result.ok) return result;

      const { response } = result;
      if (!isSuccess(response.status)) {
        return { ok: false, error: httpDiagnostic(response) };
      }
      if (!Array.isArray(response.data)) {
        return { ok: false, error: invalidBody(response.data) };
      }

      for (const item of response.data) {
        const descriptor = toRepositoryDescriptor(item);
        if (descriptor) repositories.push(descriptor);
      }
      url = nextPageUrl(response);
    }

    return { ok: true, data: repositories };
  }

  /**
   * 获取仓库信息
   * @param fullName owner/repo
   */
  async getRepository(fullName: string): Promise<RepositoryLookup> {
    const result = await this.send('GET', `/repos/${fullName}`);
    if (!result.ok) {
      return { kind: 'transport-error', diagnostic: result.error };
    }

    const { response } = result;
    if (isNotFound(response)) {
      return { kind: 'not-found' };
    }
    if (!isSuccess(response.status)) {
      return { kind: 'transport-error', diagnostic: httpDiagnostic(response) };
    }

    const repository = toRepositoryDescriptor(response.data);
    if (!repository) {
      return { kind: 'transport-error', diagnostic: invalidBody(response.data) };
    }
    return { kind: 'found', repository };
  }

  /**
   * 在已认证用户下创建仓库
   */
  async createRepository(input: CreateRepositoryInput): Promise<CreateRepositoryResult> {
    const result = await this.send('POST', '/user/repos', {
      name: input.name,
      private: input.private,
      description: input.description,
    });
    if (!result.ok) {
      return { kind: 'error', diagnostic: result.error };
    }

    const { response } = result;
    if (isNameTaken(response)) {
      return { kind: 'already-exists' };
    }
    if (!isSuccess(response.status)) {
      return { kind: 'error', diagnostic: httpDiagnostic(response) };
    }

    const repository = toRepositoryDescriptor(response.data);
    if (!repository) {
      return { kind: 'error', diagnostic: invalidBody(response.data) };
    }
    return { kind: 'created', repository };
  }

  /**
   * 删除仓库, 成功时 GitHub 返回 204 空响应
   * @param fullName owner/repo
   */
  async deleteRepository(fullName: string): Promise<ApiResult<void>> {
    const result = await this.send('DELETE', `/repos/${fullName}`);
    if (!result.ok) {
      return { ok: false, error: `${result.error}. Check the token permissions.` };
    }
    if (!isSuccess(result.response.status)) {
      return { ok: false, error: `${httpDiagnostic(result.response)}. Check the token permissions.` };
    }
    return { ok: true, data: undefined };
  }

  /**
   * 检查仓库是否存在
   * 请求失败同样返回 false, 但会输出诊断信息, 以便与 "不存在" 区分
   */
  async repositoryExists(fullName: string): Promise<boolean> {
    const lookup = await this.getRepository(fullName);
    if (lookup.kind === 'transport-error') {
      console.warn(chalk.yellow(`Could not check repository ${fullName}: ${lookup.diagnostic}`));
    }
    return lookup.kind === 'found';
  }

  /**
   * 列出仓库内容
   * @param fullName owner/repo
   * @param subPath 仓库内路径, 为空时列出根目录
   */
  async listContents(fullName: string, subPath?: string): Promise<ApiResult<ContentEntry[] | ContentEntry>> {
    const suffix = subPath ? `/${subPath.replace(/^\/+/, '')}` : '';
    const result = await this.send('GET', `/repos/${fullName}/contents${suffix}`);
    if (!result.ok) return result;

    const { response } = result;
    if (!isSuccess(response.status)) {
      return { ok: false, error: httpDiagnostic(response) };
    }

    if (Array.isArray(response.data)) {
      const entries: ContentEntry[] = [];
      for (const item of response.data) {
        const entry = toContentEntry(item);
        if (entry) entries.push(entry);
      }
      return { ok: true, data: entries };
    }

    const entry = toContentEntry(response.data);
    if (!entry) {
      return { ok: false, error: invalidBody(response.data) };
    }
    return { ok: true, data: entry };
  }
}

/**
 * 将 "repo" 补全为 "owner/repo", owner 取令牌对应的用户
 * @param repo "repo" 或 "owner/repo"
 * @param client 用于解析 owner 的客户端
 */
export async function qualifyRepositoryName(repo: string, client: GitHubClient): Promise<ApiResult<string>> {
  const trimmed = repo.trim().replace(/\.git$/, '');
  if (trimmed.includes('/')) {
    return { ok: true, data: trimmed };
  }

  const user = await client.getAuthenticatedUser();
  if (!user.ok) return user;
  return { ok: true, data: `${user.data.login}/${trimmed}` };
}
