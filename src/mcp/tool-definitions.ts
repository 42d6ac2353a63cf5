import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { POST_STATUSES } from '../types/ghost.types.js';

/**
 * Tool catalogue advertised to MCP clients, plus the zod schemas used to
 * validate the arguments each call arrives with.
 */

const postStatus = z.enum(POST_STATUSES);

// Clients send null for "not provided"; treat it like an absent key
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform((value) => value ?? undefined);

export const createPostArgsSchema = z.object({
  title: z.string(),
  content: z.string(),
  status: optional(postStatus),
  tags: optional(z.array(z.string().min(1))),
});

export const listPostsArgsSchema = z.object({
  limit: optional(z.number().int().positive()),
  status: optional(z.union([postStatus, z.literal('all')])),
});

export const editPostArgsSchema = z.object({
  post_id: z.string().min(1),
  title: optional(z.string()),
  content: optional(z.string()),
  status: optional(postStatus),
  tags: optional(z.array(z.string().min(1))),
});

export const debugApiConnectionArgsSchema = z.object({});

export const TOOL_NAMES = ['create_post', 'list_posts', 'edit_post', 'debug_api_connection'] as const;
export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}

export const TOOLS: Tool[] = [
  {
    name: 'create_post',
    description: 'Create a new post in Ghost.',
    inputSchema: {
      type: 'object',
      properties: {
        title: {
          type: 'string',
          description: 'The title of the post',
        },
        content: {
          type: 'string',
          description: 'The content/body of the post in HTML format',
        },
        status: {
          type: 'string',
          enum: [...POST_STATUSES],
          description: 'Post status (default: draft)',
        },
        tags: {
          type: 'array',
          items: { type: 'string' },
          description: 'Optional list of tag names to associate with the post',
        },
      },
      required: ['title', 'content'],
    },
  },
  {
    name: 'list_posts',
    description: 'List posts from Ghost.',
    inputSchema: {
      type: 'object',
      properties: {
        limit: {
          type: 'integer',
          minimum: 1,
          description: 'Maximum number of posts to retrieve (default: 10)',
        },
        status: {
          type: 'string',
          enum: ['all', ...POST_STATUSES],
          description: 'Filter by post status (default: all)',
        },
      },
      required: [],
    },
  },
  {
    name: 'edit_post',
    description: 'Edit an existing post in Ghost. Fields left out keep their current value.',
    inputSchema: {
      type: 'object',
      properties: {
        post_id: {
          type: 'string',
          description: 'The ID of the post to edit',
        },
        title: {
          type: 'string',
          description: 'New title for the post',
        },
        content: {
          type: 'string',
          description: 'New content/body for the post in HTML format',
        },
        status: {
          type: 'string',
          enum: [...POST_STATUSES],
          description: 'New post status',
        },
        tags: {
          type: 'array',
          items: { type: 'string' },
          description: 'New list of tag names to associate with the post',
        },
      },
      required: ['post_id'],
    },
  },
  {
    name: 'debug_api_connection',
    description: 'Debug the Ghost API connection to help diagnose credential or connectivity issues.',
    inputSchema: {
      type: 'object',
      properties: {},
      required: [],
    },
  },
];
