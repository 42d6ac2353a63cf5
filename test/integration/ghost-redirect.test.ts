import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { GhostDispatcher } from '../../src/services/ghost-dispatcher.service.js';
import { PostOperations } from '../../src/services/post-operations.service.js';
import { createSilentLogger } from '../../src/services/logger.service.js';
import { TEST_API_KEY } from '../helpers/fake-ghost-api.js';

/**
 * Redirect handling against a real local server: the axios adapter stand-in
 * never follows redirects, so this goes through the network stack.
 */
describe('Ghost redirects', () => {
  let ghost: FastifyInstance;
  let baseUrl: string;
  let seen: string[];

  const existingPost = {
    id: 'existing',
    title: 'Old post',
    url: '/old-post/',
    status: 'published',
    created_at: '2023-01-01T00:00:00.000Z',
  };

  const createOperations = () => {
    const logger = createSilentLogger();
    const dispatcher = new GhostDispatcher({ config: { baseUrl, adminApiKey: TEST_API_KEY }, logger });
    return new PostOperations({ dispatcher, logger });
  };

  beforeEach(async () => {
    seen = [];
    ghost = Fastify({ logger: false });

    ghost.post('/ghost/api/v4/admin/posts/', async (request, reply) => {
      seen.push(`${request.method} ${request.url}`);
      return reply.code(301).header('location', '/moved/ghost/api/v4/admin/posts/').send();
    });

    ghost.get('/ghost/', async (request, reply) => {
      seen.push(`${request.method} ${request.url}`);
      return reply.code(302).header('location', '/ghost/signin/').send();
    });

    ghost.get('/ghost/api/v4/admin/site/', async (request) => {
      seen.push(`${request.method} ${request.url}`);
      return { site: { title: 'Test' } };
    });

    ghost.setNotFoundHandler(async (request) => {
      seen.push(`${request.method} ${request.url}`);
      return { posts: [existingPost] };
    });

    baseUrl = await ghost.listen({ port: 0, host: '127.0.0.1' });
  });

  afterEach(async () => {
    await ghost.close();
  });

  it('should report a redirected create as an error after one request', async () => {
    const result = await createOperations().createPost({ title: 'New', content: '<p>new</p>' });

    expect(result).toBe(
      `Error creating post: POST ${baseUrl}/ghost/api/v4/admin/posts/?source=html failed with status 301: `
    );
    expect(seen).toEqual(['POST /ghost/api/v4/admin/posts/?source=html']);
  });

  it('should report the redirect status of the admin site root', async () => {
    const result = JSON.parse(await createOperations().debugApiConnection());

    expect(result.site_status).toBe(302);
    expect(result.site_url).toBe(`${baseUrl}/ghost/`);
    expect(result.api_status).toBe(200);
    expect(result.api_response).toBe('{"site":{"title":"Test"}}');
    expect(seen).toEqual(['GET /ghost/', 'GET /ghost/api/v4/admin/site/']);
  });
});
