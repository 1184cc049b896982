import { describe, it, expect, vi, beforeEach } from 'vitest';
import { postOrUpdateComment, MARKER_START, MARKER_END } from '../../src/github/comment-poster.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

describe('postOrUpdateComment', () => {
  const baseOpts = {
    token: 'test-token',
    repo: 'owner/repo',
    prNumber: 42,
    body: '# Code Review Results\nAll clear!',
  };

  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('creates a new comment when no existing comment found', async () => {
    // First call: list comments (empty)
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => [],
    });

    // Second call: create comment
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => ({ html_url: 'https://github.com/owner/repo/pull/42#issuecomment-1' }),
    });

    const url = await postOrUpdateComment(baseOpts);

    expect(url).toBe('https://github.com/owner/repo/pull/42#issuecomment-1');

    // Verify list call
    expect(mockFetch).toHaveBeenCalledTimes(2);
    const listCall = mockFetch.mock.calls[0];
    expect(listCall[0]).toBe('https://api.github.com/repos/owner/repo/issues/42/comments?per_page=100&page=1');
    expect(listCall[1].method).toBe('GET');

    // Verify create call
    const createCall = mockFetch.mock.calls[1];
    expect(createCall[0]).toBe('https://api.github.com/repos/owner/repo/issues/42/comments');
    expect(createCall[1].method).toBe('POST');
    expect(JSON.parse(createCall[1].body)).toEqual({
      body: `${MARKER_START}\n# Code Review Results\nAll clear!\n${MARKER_END}`,
    });
  });

  it('updates an existing comment when marker is found', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => [
        { id: 100, body: 'Some other comment' },
        { id: 101, body: null },
        { id: 200, body: `${MARKER_START}\nOld report\n${MARKER_END}` },
      ],
    });
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => ({ html_url: 'https://github.com/owner/repo/pull/42#issuecomment-200' }),
    });

    const url = await postOrUpdateComment(baseOpts);

    expect(url).toBe('https://github.com/owner/repo/pull/42#issuecomment-200');
    const updateCall = mockFetch.mock.calls[1];
    expect(updateCall[0]).toBe('https://api.github.com/repos/owner/repo/issues/comments/200');
    expect(updateCall[1].method).toBe('PATCH');
  });

  it('throws when creating a comment fails', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, json: async () => [] });
    mockFetch.mockResolvedValueOnce({ ok: false, status: 403, text: async () => 'Forbidden' });

    await expect(postOrUpdateComment(baseOpts)).rejects.toThrow(
      'GitHub API error creating comment: 403 Forbidden',
    );
  });

  it('throws when updating a comment fails', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => [{ id: 200, body: `${MARKER_START}\nOld\n${MARKER_END}` }],
    });
    mockFetch.mockResolvedValueOnce({ ok: false, status: 500, text: async () => 'Internal Server Error' });

    await expect(postOrUpdateComment(baseOpts)).rejects.toThrow(
      'GitHub API error updating comment: 500 Internal Server Error',
    );
  });

  it('throws when the saved comment has no URL', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, json: async () => [] });
    mockFetch.mockResolvedValueOnce({ ok: true, json: async () => ({ id: 1 }) });

    await expect(postOrUpdateComment(baseOpts)).rejects.toThrow(
      'GitHub API returned an unexpected response creating comment',
    );
  });

  it('treats failed list call as no existing comment and creates new', async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 404 });
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => ({ html_url: 'https://github.com/owner/repo/pull/42#issuecomment-3' }),
    });

    const url = await postOrUpdateComment(baseOpts);
    expect(url).toBe('https://github.com/owner/repo/pull/42#issuecomment-3');
    expect(mockFetch.mock.calls[1][1].method).toBe('POST');
  });

  it('paginates through comments to find marker', async () => {
    const page1 = Array.from({ length: 100 }, (_, i) => ({ id: i + 1, body: `Comment ${i + 1}` }));
    mockFetch.mockResolvedValueOnce({ ok: true, json: async () => page1 });
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => [{ id: 500, body: `${MARKER_START}\nReport\n${MARKER_END}` }],
    });
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => ({ html_url: 'https://github.com/owner/repo/pull/42#issuecomment-500' }),
    });

    const url = await postOrUpdateComment(baseOpts);
    expect(url).toBe('https://github.com/owner/repo/pull/42#issuecomment-500');

    // First two calls are GET (pagination), third is PATCH (update)
    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(mockFetch.mock.calls[0][0]).toContain('page=1');
    expect(mockFetch.mock.calls[1][0]).toContain('page=2');
    expect(mockFetch.mock.calls[2][1].method).toBe('PATCH');
  });

  it('sends the GitHub API headers', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, json: async () => [] });
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => ({ html_url: 'https://github.com/owner/repo/pull/42#issuecomment-1' }),
    });

    await postOrUpdateComment(baseOpts);

    expect(mockFetch.mock.calls[0][1].headers).toEqual({
      Authorization: 'Bearer test-token',
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    });
  });
});
