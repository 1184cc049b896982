export const GITHUB_API_URL = 'https://api.github.com';

/** GitHub caps list endpoints at 100 items per page. */
export const GITHUB_PAGE_SIZE = 100;

export function githubHeaders(token: string): Record<string, string> {
  return {
    Authorization: `Bearer ${token}`,
    Accept: 'application/vnd.github+json',
    'X-GitHub-Api-Version': '2022-11-28',
  };
}
