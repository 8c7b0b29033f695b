import { Octokit } from '@octokit/rest';
import type { PullRequest } from './types.js';

const OWNER = 'NixOS';
const REPO = 'nixpkgs';

/** GitHub account ofborg posts its commit statuses as */
const OFBORG_LOGIN = 'ofborg[bot]';

/** Description of ofborg's status once evaluation succeeded */
const OFBORG_EVAL_DONE = '^.^!';

/**
 * Create an Octokit instance, authenticated when a token is given.
 * Anonymous requests work but run into GitHub's rate limit sooner.
 */
export function createOctokit(token?: string): Octokit {
  return new Octokit(token ? { auth: token } : {});
}

/**
 * Fetch the metadata of a nixpkgs pull request needed to review it.
 */
export async function fetchPullRequest(octokit: Octokit, prNumber: number): Promise<PullRequest> {
  const { data: pr } = await octokit.pulls.get({
    owner: OWNER,
    repo: REPO,
    pull_number: prNumber,
  });

  return {
    number: pr.number,
    baseRef: pr.base.ref,
    headSha: pr.head.sha,
  };
}

/**
 * Fetch the list of packages ofborg evaluated for a commit.
 *
 * Looks for ofborg's successful evaluation status on `sha`; its target URL
 * points at a gist of `<system> <attr>` lines. Returns the gist text, or null
 * when ofborg has not (successfully) evaluated the commit.
 */
export async function fetchOfborgEvalGist(octokit: Octokit, sha: string): Promise<string | null> {
  const { data: statuses } = await octokit.repos.listCommitStatusesForRef({
    owner: OWNER,
    repo: REPO,
    ref: sha,
    per_page: 100,
  });

  const evaluated = statuses.find(
    (s) => s.description === OFBORG_EVAL_DONE && s.creator?.login === OFBORG_LOGIN && s.target_url,
  );
  if (!evaluated?.target_url) return null;

  const gistId = new URL(evaluated.target_url).pathname.split('/').filter(Boolean).pop();
  if (!gistId) return null;

  const { data: gist } = await octokit.gists.get({ gist_id: gistId });
  const contents = Object.values(gist.files ?? {}).map((file) => file?.content ?? '');
  return contents.join('\n');
}
