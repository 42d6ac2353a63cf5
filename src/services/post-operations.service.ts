import type {
  CreatePostArgs,
  EditPostArgs,
  ListPostsArgs,
  PostsPayload,
  PostWrite,
  TagInput,
} from '../types/ghost.types.js';
import type { GhostDispatcher } from './ghost-dispatcher.service.js';
import type { StructuredLogger } from './logger.service.js';
import {
  createPostResponseSchema,
  decodeResponse,
  listPostsResponseSchema,
  readPostResponseSchema,
  updatePostResponseSchema,
} from './ghost-response.schemas.js';
import { postEndpoint, postsCollectionEndpoint, siteEndpoint } from './ghost-request.builder.js';

/**
 * Post Operations
 *
 * The four tool operations. Each one returns the text handed back to the MCP
 * client: pretty-printed JSON on success, an "Error ..." line (or a JSON
 * object with an `error` field) otherwise. Nothing here throws.
 */

export const NO_POSTS_MESSAGE = 'No posts found matching the criteria.';
export const DEBUG_RESPONSE_SNIPPET_LENGTH = 500;

const DEFAULT_LIST_LIMIT = 10;

function pretty(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function toTagInputs(tags?: string[]): TagInput[] | undefined {
  if (!tags || tags.length === 0) {
    return undefined;
  }
  return tags.map((name) => ({ name }));
}

export interface PostOperationsDeps {
  dispatcher: GhostDispatcher;
  logger: StructuredLogger;
}

export class PostOperations {
  private dispatcher: GhostDispatcher;
  private logger: StructuredLogger;

  constructor(deps: PostOperationsDeps) {
    this.dispatcher = deps.dispatcher;
    this.logger = deps.logger;
  }

  /**
   * Creates a post from HTML content
   */
  async createPost(args: CreatePostArgs): Promise<string> {
    const post: PostWrite = {
      title: args.title,
      html: args.content,
      status: args.status ?? 'draft',
    };

    const tags = toTagInputs(args.tags);
    if (tags) {
      post.tags = tags;
    }

    const payload: PostsPayload = { posts: [post] };
    const response = await this.dispatcher.dispatch({
      endpoint: postsCollectionEndpoint(),
      method: 'POST',
      body: payload,
    });

    if (!response.success) {
      return `Error creating post: ${response.error.message}`;
    }

    const decoded = decodeResponse(createPostResponseSchema, response.data);
    if (!decoded.success) {
      this.logger.warn('Unexpected create_post response', { error_kind: decoded.error.kind, detail: decoded.error.message });
      return pretty({ error: 'Unexpected response format', response: response.data });
    }

    const created = decoded.data.posts[0];
    return pretty({
      id: created.id,
      title: created.title,
      url: created.url,
      status: created.status,
      created_at: created.created_at,
    });
  }

  /**
   * Lists posts, newest first as ordered by the API
   */
  async listPosts(args: ListPostsArgs = {}): Promise<string> {
    const response = await this.dispatcher.dispatch({
      endpoint: postsCollectionEndpoint({
        limit: args.limit ?? DEFAULT_LIST_LIMIT,
        status: args.status ?? 'all',
      }),
      method: 'GET',
    });

    if (!response.success) {
      return `Error listing posts: ${response.error.message}`;
    }

    const decoded = decodeResponse(listPostsResponseSchema, response.data);
    if (!decoded.success) {
      this.logger.warn('Unexpected list_posts response', { error_kind: decoded.error.kind, detail: decoded.error.message });
      return pretty({ error: 'Unexpected response format', response: response.data });
    }

    if (decoded.data.posts.length === 0) {
      return NO_POSTS_MESSAGE;
    }

    return pretty(
      decoded.data.posts.map((post) => ({
        id: post.id,
        title: post.title,
        status: post.status,
        created_at: post.created_at,
        updated_at: post.updated_at,
      }))
    );
  }

  /**
   * Reads the current post, then writes it back with the supplied changes.
   * The fetched updated_at goes into the write so Ghost can reject the
   * update if someone else changed the post in between.
   */
  async editPost(args: EditPostArgs): Promise<string> {
    const endpoint = postEndpoint(args.post_id);

    const current = await this.dispatcher.dispatch({ endpoint, method: 'GET' });
    if (!current.success) {
      return `Error retrieving post: ${current.error.message}`;
    }

    const stored = decodeResponse(readPostResponseSchema, current.data);
    if (!stored.success) {
      return `Error processing post data: ${stored.error.message}`;
    }

    const existing = stored.data.posts[0];
    const update: PostWrite = {
      id: args.post_id,
      title: args.title ?? existing.title,
      html: args.content ?? existing.html,
      status: args.status ?? existing.status,
      updated_at: existing.updated_at,
    };

    const tags = toTagInputs(args.tags);
    if (tags) {
      update.tags = tags;
    }

    const payload: PostsPayload = { posts: [update] };
    const response = await this.dispatcher.dispatch({ endpoint, method: 'PUT', body: payload });

    if (!response.success) {
      return `Error updating post: ${response.error.message}`;
    }

    const decoded = decodeResponse(updatePostResponseSchema, response.data);
    if (!decoded.success) {
      return `Error processing post data: ${decoded.error.message}`;
    }

    const updated = decoded.data.posts[0];
    return pretty({
      id: updated.id,
      title: updated.title,
      url: updated.url,
      status: updated.status,
      updated_at: updated.updated_at,
    });
  }

  /**
   * Connection diagnostic: probes the admin site root without auth and the
   * site endpoint with a signed token, and reports what came back.
   */
  async debugApiConnection(): Promise<string> {
    const apiUrl = this.dispatcher.adminUrl(siteEndpoint());
    const failure = (message: string) =>
      pretty({
        error: message,
        api_url: apiUrl,
        api_key_format: this.dispatcher.hasWellFormedKey() ? 'ID:SECRET' : 'Invalid',
      });

    try {
      const site = await this.dispatcher.probe(this.dispatcher.siteRootUrl());

      const headers = this.dispatcher.buildAuthHeaders();
      if (!headers.success) {
        return failure(headers.error.message);
      }

      const api = await this.dispatcher.probe(apiUrl, headers.data);

      return pretty({
        site_status: site.status,
        site_url: site.url,
        api_status: api.status,
        api_url: api.url,
        api_response: Array.from(api.text).slice(0, DEBUG_RESPONSE_SNIPPET_LENGTH).join(''),
        headers_sent: headers.data,
      });
    } catch (error) {
      this.logger.error('Connection diagnostic failed', { error });
      return failure(error instanceof Error ? error.message : String(error));
    }
  }
}
