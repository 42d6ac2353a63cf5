/**
 * Ghost Admin API types
 */

export const GHOST_API_VERSION = 'v4';

/**
 * HTTP methods the dispatcher is allowed to send
 */
export const SUPPORTED_METHODS = ['GET', 'POST', 'PUT'] as const;
export type HttpMethod = (typeof SUPPORTED_METHODS)[number];

export const POST_STATUSES = ['draft', 'published', 'scheduled'] as const;
export type PostStatus = (typeof POST_STATUSES)[number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Outbound request, relative to the admin API root
 */
export interface ApiRequest {
  endpoint: string;
  method: string;
  body?: unknown;
}

/**
 * Admin key split into its two halves
 */
export interface Credential {
  keyId: string;
  secret: string; // hex encoded
}

export interface GhostConnectionConfig {
  baseUrl: string;
  adminApiKey: string;
}

/**
 * Tag reference as sent to the API
 */
export interface TagInput {
  name: string;
}

/**
 * Post fields written by this server
 */
export interface PostWrite {
  id?: string;
  title: string;
  html: string | null;
  status: string;
  updated_at?: string;
  tags?: TagInput[];
}

export interface PostsPayload {
  posts: PostWrite[];
}

export interface CreatePostArgs {
  title: string;
  content: string;
  status?: PostStatus;
  tags?: string[];
}

export interface ListPostsArgs {
  limit?: number;
  status?: PostStatus | 'all';
}

export interface EditPostArgs {
  post_id: string;
  title?: string;
  content?: string;
  status?: PostStatus;
  tags?: string[];
}
