import { describe, it, expect, vi } from 'vitest';
import { Octokit } from '@octokit/rest';
import { createOctokit, fetchOfborgEvalGist, fetchPullRequest } from '../src/github.js';

interface MockStatus {
  description: string | null;
  target_url: string | null;
  creator: { login: string } | null;
}

function createMockOctokit(statuses: MockStatus[] = [], gistFiles: Record<string, { content?: string } | null> = {}) {
  const mock = {
    pulls: {
      get: vi.fn(async () => ({
        data: {
          number: 42,
          base: { ref: 'staging' },
          head: { ref: 'update-hello', sha: 'abc123def456' },
        },
      })),
    },
    repos: {
      listCommitStatusesForRef: vi.fn(async () => ({ data: statuses })),
    },
    gists: {
      get: vi.fn(async () => ({ data: { files: gistFiles } })),
    },
  };
  return { mock, octokit: mock as unknown as Octokit };
}

const OFBORG_DONE: MockStatus = {
  description: '^.^!',
  target_url: 'https://gist.github.com/0123abcd',
  creator: { login: 'ofborg[bot]' },
};

describe('createOctokit', () => {
  it('creates an Octokit client with or without a token', () => {
    expect(createOctokit()).toBeInstanceOf(Octokit);
    expect(createOctokit('test-token')).toBeInstanceOf(Octokit);
  });
});

describe('fetchPullRequest', () => {
  it('asks for the PR on NixOS/nixpkgs', async () => {
    const { mock, octokit } = createMockOctokit();

    await fetchPullRequest(octokit, 42);

    expect(mock.pulls.get).toHaveBeenCalledWith({ owner: 'NixOS', repo: 'nixpkgs', pull_number: 42 });
  });

  it('maps number, base ref and head sha', async () => {
    const { octokit } = createMockOctokit();

    await expect(fetchPullRequest(octokit, 42)).resolves.toEqual({
      number: 42,
      baseRef: 'staging',
      headSha: 'abc123def456',
    });
  });
});

describe('fetchOfborgEvalGist', () => {
  it("returns the content of the gist linked from ofborg's status", async () => {
    const { mock, octokit } = createMockOctokit([OFBORG_DONE], {
      'packages.txt': { content: 'x86_64-linux hello\nx86_64-linux jq' },
    });

    await expect(fetchOfborgEvalGist(octokit, 'abc123')).resolves.toBe('x86_64-linux hello\nx86_64-linux jq');
    expect(mock.repos.listCommitStatusesForRef).toHaveBeenCalledWith({
      owner: 'NixOS',
      repo: 'nixpkgs',
      ref: 'abc123',
      per_page: 100,
    });
    expect(mock.gists.get).toHaveBeenCalledWith({ gist_id: '0123abcd' });
  });

  it('takes the gist id from the last path segment of the target URL', async () => {
    const { mock, octokit } = createMockOctokit(
      [{ ...OFBORG_DONE, target_url: 'https://gist.github.com/GrahamcOfBorg/feed42/' }],
      { a: { content: '' } },
    );

    await fetchOfborgEvalGist(octokit, 'abc123');

    expect(mock.gists.get).toHaveBeenCalledWith({ gist_id: 'feed42' });
  });

  it('joins the content of every gist file', async () => {
    const { octokit } = createMockOctokit([OFBORG_DONE], {
      'a.txt': { content: 'x86_64-linux a' },
      'b.txt': null,
      'c.txt': { content: 'x86_64-linux c' },
    });

    await expect(fetchOfborgEvalGist(octokit, 'abc123')).resolves.toBe('x86_64-linux a\n\nx86_64-linux c');
  });

  it('ignores statuses from other accounts and unfinished evaluations', async () => {
    const { mock, octokit } = createMockOctokit([
      { ...OFBORG_DONE, creator: { login: 'someone-else' } },
      { ...OFBORG_DONE, description: 'Running evaluation' },
      { ...OFBORG_DONE, target_url: null },
    ]);

    await expect(fetchOfborgEvalGist(octokit, 'abc123')).resolves.toBeNull();
    expect(mock.gists.get).not.toHaveBeenCalled();
  });

  it('returns null when the commit has no statuses', async () => {
    const { octokit } = createMockOctokit([]);

    await expect(fetchOfborgEvalGist(octokit, 'abc123')).resolves.toBeNull();
  });
});
