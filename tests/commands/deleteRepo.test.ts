import { afterEach, describe, expect, it, vi } from 'vitest';
import { deleteRepo } from '../../src/commands/deleteRepo';
import { captureConsole, createTestContext, FakeGit, FakeGitHub, repoPayload } from '../helpers';

function api(): FakeGitHub {
  return new FakeGitHub({
    'GET /user': { status: 200, data: { login: 'octo', id: 1 } },
    'GET /repos/octo/app': { status: 200, data: repoPayload('octo/app') },
    'DELETE /repos/octo/app': { status: 204 },
  });
}

describe('deleteRepo', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it.each([
    ['--force', { force: true, yes: false }],
    ['--yes', { force: false, yes: true }],
  ])('deletes without prompting when %s is given', async (_flag, flags) => {
    const output = captureConsole();
    const github = api();
    const ctx = createTestContext({ personal: 'test-token' }, { 'test-token': github });

    const code = await deleteRepo({ repo: 'app', account: 'personal', ...flags }, ctx);

    expect(code).toBe(0);
    expect(ctx.prompts).toEqual([]);
    expect(github.handled('DELETE /repos/octo/app')).toBe(true);
    expect(output).toEqual(['Successfully deleted repository octo/app']);
  });

  it('leaves the repository alone when the prompt is declined', async () => {
    const output = captureConsole();
    const github = api();
    const ctx = createTestContext({ personal: 'test-token' }, { 'test-token': github }, new FakeGit(), false);

    const code = await deleteRepo({ repo: 'octo/app', account: 'personal', force: false, yes: false }, ctx);

    expect(code).toBe(0);
    expect(ctx.prompts).toEqual(['Are you sure you want to delete octo/app? This cannot be undone.']);
    expect(github.handled('DELETE /repos/octo/app')).toBe(false);
    expect(output).toEqual(['Deletion cancelled.']);
  });

  it('deletes after a confirmed prompt', async () => {
    captureConsole();
    const github = api();
    const ctx = createTestContext({ personal: 'test-token' }, { 'test-token': github }, new FakeGit(), true);

    const code = await deleteRepo({ repo: 'octo/app', account: 'personal', force: false, yes: false }, ctx);

    expect(code).toBe(0);
    expect(github.handled('DELETE /repos/octo/app')).toBe(true);
  });

  it('fails for a repository that does not exist', async () => {
    const output = captureConsole();
    const ctx = createTestContext({ personal: 'test-token' }, { 'test-token': api() });

    const code = await deleteRepo({ repo: 'octo/missing', account: 'personal', force: true, yes: false }, ctx);

    expect(code).toBe(1);
    expect(output).toEqual(['Repository octo/missing not found or not accessible.']);
  });

  it('reports a rejected deletion with a permission hint', async () => {
    const output = captureConsole();
    const github = api().on('DELETE /repos/octo/app', { status: 403, data: { message: 'Forbidden' } });
    const ctx = createTestContext({ personal: 'test-token' }, { 'test-token': github });

    const code = await deleteRepo({ repo: 'octo/app', account: 'personal', force: true, yes: false }, ctx);

    expect(code).toBe(1);
    expect(output).toEqual(['Failed to delete repository: HTTP 403: Forbidden. Check the token permissions.']);
  });

  it('fails for an unknown account', async () => {
    const output = captureConsole();
    const ctx = createTestContext({}, {});

    const code = await deleteRepo({ repo: 'octo/app', account: 'personal', force: true, yes: true }, ctx);

    expect(code).toBe(1);
    expect(output).toEqual(["Account 'personal' not found in config."]);
  });
});
