// 账号配置文件结构: { accounts: { name: token } }
export interface Config {
  accounts: Record<string, string>;
}

// 已认证的GitHub用户
export interface AuthenticatedUser {
  login: string;
  id: number;
}

// 仓库信息
export interface RepositoryDescriptor {
  fullName: string; // owner/name
  name: string;
  ownerLogin: string;
  private: boolean;
  description: string;
  cloneUrl: string; // 不带令牌的 HTTPS clone URL
  defaultBranch: string;
}

export type ContentType = 'file' | 'dir' | 'symlink' | 'submodule';

// 仓库内容条目 (GET /repos/{owner}/{repo}/contents/{path})
export interface ContentEntry {
  name: string;
  path: string;
  type: ContentType;
  size: number;
  content?: string;
  encoding?: string;
}

export type ApiResult<T> = { ok: true; data: T } | { ok: false; error: string };

export type RepositoryLookup =
  | { kind: 'found'; repository: RepositoryDescriptor }
  | { kind: 'not-found' }
  | { kind: 'transport-error'; diagnostic: string };

export type CreateRepositoryResult =
  | { kind: 'created'; repository: RepositoryDescriptor }
  | { kind: 'already-exists' }
  | { kind: 'error'; diagnostic: string };

export interface CreateRepositoryInput {
  name: string;
  private: boolean;
  description: string;
}

// 外部 git 命令的执行结果
export type GitResult = { ok: true; output: string } | { ok: false; error: string };

export interface TransferRequest {
  sourceUrl: string; // 带令牌, 不可打印
  destinationUrl: string; // 带令牌, 不可打印
  branch?: string;
}

export interface TransferResult {
  success: boolean;
  message: string;
  resolvedBranch?: string;
  warnings: string[];
}

export interface AddAccountRequest {
  name: string;
  token: string;
}

export interface RemoveAccountRequest {
  name: string;
  yes: boolean;
}

export interface CopyRepoRequest {
  repo: string; // "name" 或 "owner/name"
  source: string;
  dest: string;
  branch?: string;
}

export interface DeleteRepoRequest {
  repo: string;
  account: string;
  force: boolean;
  yes: boolean;
}

export type MoveRepoRequest = CopyRepoRequest;

export interface ViewRepoRequest {
  repo: string;
  account: string;
  path?: string;
}
