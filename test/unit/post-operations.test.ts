import { describe, it, expect, beforeEach } from 'vitest';
import { GhostDispatcher } from '../../src/services/ghost-dispatcher.service.js';
import { PostOperations, NO_POSTS_MESSAGE } from '../../src/services/post-operations.service.js';
import { createSilentLogger } from '../../src/services/logger.service.js';
import type { ListPostsArgs } from '../../src/types/ghost.types.js';
import {
  ADMIN_ROOT,
  FakeGhostApi,
  TEST_API_KEY,
  TEST_BASE_URL,
  headerOf,
} from '../helpers/fake-ghost-api.js';

const POSTS_URL = `${ADMIN_ROOT}/posts/?source=html`;
const POST_URL = `${ADMIN_ROOT}/posts/p1/?source=html`;

const storedPost = {
  id: 'p1',
  title: 'Old title',
  html: '<p>old</p>',
  status: 'draft',
  created_at: '2024-02-01T09:00:00.000Z',
  updated_at: '2024-02-01T10:00:00.000Z',
};

describe('PostOperations', () => {
  let api: FakeGhostApi;

  const createOperations = (adminApiKey = TEST_API_KEY) => {
    const logger = createSilentLogger();
    const dispatcher = new GhostDispatcher({
      config: { baseUrl: TEST_BASE_URL, adminApiKey },
      logger,
      http: api.createClient(),
    });
    return new PostOperations({ dispatcher, logger });
  };

  beforeEach(() => {
    api = new FakeGhostApi();
  });

  describe('createPost', () => {
    it('should return the created post summary', async () => {
      api.on('POST', POSTS_URL, {
        status: 201,
        body: {
          posts: [
            {
              id: '1',
              title: 'Hello',
              url: '/hello/',
              status: 'draft',
              created_at: '2024-01-01T00:00:00.000Z',
              html: '<p>hi</p>',
            },
          ],
        },
      });

      const result = await createOperations().createPost({ title: 'Hello', content: '<p>hi</p>' });

      expect(result).toBe(
        [
          '{',
          '  "id": "1",',
          '  "title": "Hello",',
          '  "url": "/hello/",',
          '  "status": "draft",',
          '  "created_at": "2024-01-01T00:00:00.000Z"',
          '}',
        ].join('\n')
      );
      expect(api.requests[0].body).toEqual({
        posts: [{ title: 'Hello', html: '<p>hi</p>', status: 'draft' }],
      });
    });

    it('should send tags as name objects', async () => {
      api.on('POST', POSTS_URL, { status: 201, body: { posts: [] } });

      await createOperations().createPost({
        title: 'Tagged',
        content: '<p>x</p>',
        status: 'published',
        tags: ['news', 'tech'],
      });

      expect(api.requests[0].body).toEqual({
        posts: [
          {
            title: 'Tagged',
            html: '<p>x</p>',
            status: 'published',
            tags: [{ name: 'news' }, { name: 'tech' }],
          },
        ],
      });
    });

    it('should leave tags out when the list is empty', async () => {
      api.on('POST', POSTS_URL, { status: 201, body: { posts: [] } });

      await createOperations().createPost({ title: 'T', content: '', tags: [] });

      expect(api.requests[0].body).toEqual({ posts: [{ title: 'T', html: '', status: 'draft' }] });
    });

    it('should prefix API errors', async () => {
      const body = '{"errors":[{"message":"Validation error"}]}';
      api.on('POST', POSTS_URL, { status: 422, body });

      const result = await createOperations().createPost({ title: 'Hello', content: '<p>hi</p>' });

      expect(result).toBe(`Error creating post: POST ${POSTS_URL} failed with status 422: ${body}`);
    });

    it('should report an unexpected response shape with the raw response', async () => {
      api.on('POST', POSTS_URL, { status: 201, body: { posts: [] } });

      const result = await createOperations().createPost({ title: 'Hello', content: '<p>hi</p>' });

      expect(JSON.parse(result)).toEqual({ error: 'Unexpected response format', response: { posts: [] } });
    });

    it('should not call the API with a malformed key', async () => {
      const result = await createOperations('no-separator').createPost({ title: 'Hello', content: '' });

      expect(result).toBe("Error creating post: Invalid API key format. Expected 'ID:SECRET'");
      expect(api.requests).toHaveLength(0);
    });
  });

  describe('listPosts', () => {
    it('should default to ten posts of any status', async () => {
      api.on('GET', `${POSTS_URL}&limit=10`, { status: 200, body: { posts: [storedPost] } });

      const result = await createOperations().listPosts();

      expect(JSON.parse(result)).toEqual([
        {
          id: 'p1',
          title: 'Old title',
          status: 'draft',
          created_at: '2024-02-01T09:00:00.000Z',
          updated_at: '2024-02-01T10:00:00.000Z',
        },
      ]);
    });

    it('should filter by status and keep the API order', async () => {
      const second = { ...storedPost, id: 'p2', title: 'Second' };
      api.on('GET', `${POSTS_URL}&limit=2&filter=status%3Adraft`, { status: 200, body: { posts: [second, storedPost] } });

      const result = await createOperations().listPosts({ limit: 2, status: 'draft' });

      const ids = JSON.parse(result).map((post: { id: string }) => post.id);
      expect(ids).toEqual(['p2', 'p1']);
    });

    const emptyCases: Array<{ limit?: number; status?: ListPostsArgs['status']; url: string }> = [
      { url: `${POSTS_URL}&limit=10` },
      { limit: 3, status: 'published', url: `${POSTS_URL}&limit=3&filter=status%3Apublished` },
      { limit: 50, status: 'all', url: `${POSTS_URL}&limit=50` },
    ];

    it.each(emptyCases)('should return the no-posts message for $url', async ({ limit, status, url }) => {
      api.on('GET', url, { status: 200, body: { posts: [] } });

      const result = await createOperations().listPosts({ limit, status });

      expect(result).toBe(NO_POSTS_MESSAGE);
      expect(result).toBe('No posts found matching the criteria.');
    });

    it('should prefix API errors', async () => {
      api.on('GET', `${POSTS_URL}&limit=10`, { error: new Error('getaddrinfo ENOTFOUND blog.example.test') });

      const result = await createOperations().listPosts();

      expect(result).toBe('Error listing posts: getaddrinfo ENOTFOUND blog.example.test');
    });

    it('should report an unexpected response shape', async () => {
      api.on('GET', `${POSTS_URL}&limit=10`, { status: 200, body: { meta: {} } });

      const result = await createOperations().listPosts();

      expect(JSON.parse(result)).toEqual({ error: 'Unexpected response format', response: { meta: {} } });
    });
  });

  describe('editPost', () => {
    const updatedPost = {
      id: 'p1',
      title: 'Old title',
      url: '/old-title/',
      status: 'published',
      updated_at: '2024-02-01T10:05:00.000Z',
    };

    it('should keep fetched fields and send the fetched updated_at', async () => {
      api
        .on('GET', POST_URL, { status: 200, body: { posts: [storedPost] } })
        .on('PUT', POST_URL, { status: 200, body: { posts: [updatedPost] } });

      const result = await createOperations().editPost({ post_id: 'p1', status: 'published' });

      expect(api.requests.map((request) => request.method)).toEqual(['GET', 'PUT']);
      expect(api.requests[1].body).toEqual({
        posts: [
          {
            id: 'p1',
            title: 'Old title',
            html: '<p>old</p>',
            status: 'published',
            updated_at: '2024-02-01T10:00:00.000Z',
          },
        ],
      });
      expect(JSON.parse(result)).toEqual(updatedPost);
    });

    it('should apply every supplied field', async () => {
      api
        .on('GET', POST_URL, { status: 200, body: { posts: [storedPost] } })
        .on('PUT', POST_URL, { status: 200, body: { posts: [updatedPost] } });

      await createOperations().editPost({
        post_id: 'p1',
        title: 'New title',
        content: '<p>new</p>',
        status: 'scheduled',
        tags: ['launch'],
      });

      expect(api.requests[1].body).toEqual({
        posts: [
          {
            id: 'p1',
            title: 'New title',
            html: '<p>new</p>',
            status: 'scheduled',
            updated_at: '2024-02-01T10:00:00.000Z',
            tags: [{ name: 'launch' }],
          },
        ],
      });
    });

    it('should not write when the read fails', async () => {
      const body = '{"errors":[{"message":"Post not found."}]}';
      api.on('GET', POST_URL, { status: 404, body });

      const result = await createOperations().editPost({ post_id: 'p1', title: 'New title' });

      expect(result.startsWith('Error retrieving post:')).toBe(true);
      expect(result).toBe(`Error retrieving post: GET ${POST_URL} failed with status 404: ${body}`);
      expect(api.requests).toHaveLength(1);
      expect(api.requests[0].method).toBe('GET');
    });

    it('should report a rejected write', async () => {
      const body = '{"errors":[{"message":"Saving failed! Someone else is editing this post."}]}';
      api
        .on('GET', POST_URL, { status: 200, body: { posts: [storedPost] } })
        .on('PUT', POST_URL, { status: 409, body });

      const result = await createOperations().editPost({ post_id: 'p1', title: 'New title' });

      expect(result).toBe(`Error updating post: PUT ${POST_URL} failed with status 409: ${body}`);
    });

    it('should report a fetched post without updated_at', async () => {
      const { updated_at: _omitted, ...withoutTimestamp } = storedPost;
      api.on('GET', POST_URL, { status: 200, body: { posts: [withoutTimestamp] } });

      const result = await createOperations().editPost({ post_id: 'p1', status: 'published' });

      expect(result).toBe('Error processing post data: posts.0.updated_at: Required');
      expect(api.requests).toHaveLength(1);
    });

    it('should report an empty read', async () => {
      api.on('GET', POST_URL, { status: 200, body: { posts: [] } });

      const result = await createOperations().editPost({ post_id: 'p1' });

      expect(result.startsWith('Error processing post data: posts')).toBe(true);
      expect(api.requests).toHaveLength(1);
    });

    it('should report a malformed write response', async () => {
      api
        .on('GET', POST_URL, { status: 200, body: { posts: [storedPost] } })
        .on('PUT', POST_URL, { status: 200, body: { posts: [{ id: 'p1' }] } });

      const result = await createOperations().editPost({ post_id: 'p1', title: 'x' });

      expect(result.startsWith('Error processing post data: posts.0.')).toBe(true);
    });

    it('should keep a null html body as fetched', async () => {
      api
        .on('GET', POST_URL, { status: 200, body: { posts: [{ ...storedPost, html: null }] } })
        .on('PUT', POST_URL, { status: 200, body: { posts: [updatedPost] } });

      await createOperations().editPost({ post_id: 'p1', title: 'Renamed' });

      expect(api.requests[1].body).toEqual({
        posts: [
          {
            id: 'p1',
            title: 'Renamed',
            html: null,
            status: 'draft',
            updated_at: '2024-02-01T10:00:00.000Z',
          },
        ],
      });
    });
  });

  describe('debugApiConnection', () => {
    const SITE_ROOT = `${TEST_BASE_URL}/ghost/`;
    const SITE_API = `${ADMIN_ROOT}/site/`;

    it('should report both probes and the headers sent', async () => {
      api
        .on('GET', SITE_ROOT, { status: 200, body: '<html>admin</html>' })
        .on('GET', SITE_API, { status: 200, body: 'a'.repeat(800) });

      const result = JSON.parse(await createOperations().debugApiConnection());

      expect(result.site_status).toBe(200);
      expect(result.site_url).toBe(SITE_ROOT);
      expect(result.api_status).toBe(200);
      expect(result.api_url).toBe(SITE_API);
      expect(result.api_response).toBe('a'.repeat(500));
      expect(result.headers_sent['Accept-Version']).toBe('v4');
      expect(result.headers_sent['Content-Type']).toBe('application/json');
      expect(result.headers_sent.Authorization).toMatch(/^Ghost /);
      expect(headerOf(api.requests[0], 'Authorization')).toBeUndefined();
      expect(headerOf(api.requests[1], 'Authorization')).toBe(result.headers_sent.Authorization);
    });

    it('should keep short bodies whole and report auth failures', async () => {
      const body = '{"errors":[{"message":"Invalid token"}]}';
      api
        .on('GET', SITE_ROOT, { status: 200, body: 'ok' })
        .on('GET', SITE_API, { status: 401, body });

      const result = JSON.parse(await createOperations().debugApiConnection());

      expect(result.api_status).toBe(401);
      expect(result.api_response).toBe(body);
    });

    it('should report a malformed key as structured JSON', async () => {
      api.on('GET', SITE_ROOT, { status: 200, body: 'ok' });

      const result = JSON.parse(await createOperations('not-a-key').debugApiConnection());

      expect(result).toEqual({
        error: "Invalid API key format. Expected 'ID:SECRET'",
        api_url: SITE_API,
        api_key_format: 'Invalid',
      });
      expect(api.requests).toHaveLength(1);
    });

    it('should flag a key with an empty secret as invalid', async () => {
      api.on('GET', SITE_ROOT, { status: 200, body: 'ok' });

      const result = JSON.parse(await createOperations('abc:').debugApiConnection());

      expect(result).toEqual({
        error: "Invalid API key format. Expected 'ID:SECRET'",
        api_url: SITE_API,
        api_key_format: 'Invalid',
      });
    });

    it('should truncate the response by characters, not code units', async () => {
      const body = `${'a'.repeat(499)}😀${'b'.repeat(10)}`;
      api
        .on('GET', SITE_ROOT, { status: 200, body: 'ok' })
        .on('GET', SITE_API, { status: 200, body });

      const result = JSON.parse(await createOperations().debugApiConnection());

      expect(result.api_response).toBe(`${'a'.repeat(499)}😀`);
    });

    it('should report transport failures as structured JSON', async () => {
      api.on('GET', SITE_ROOT, { error: new Error('connect ECONNREFUSED 10.0.0.1:443') });

      const result = JSON.parse(await createOperations().debugApiConnection());

      expect(result).toEqual({
        error: 'connect ECONNREFUSED 10.0.0.1:443',
        api_url: SITE_API,
        api_key_format: 'ID:SECRET',
      });
    });
  });
});
