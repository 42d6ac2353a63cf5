import { z } from 'zod';
import type { JsonObject } from '../types/ghost.types.js';
import { fail, ok, type ResponseShapeError, type Result } from '../types/errors.types.js';

/**
 * Response schemas for the admin endpoints this server reads.
 * Only the fields the operations use are required; everything else passes through.
 */

const timestamp = z.string();

export const createdPostSchema = z.object({
  id: z.string(),
  title: z.string(),
  url: z.string(),
  status: z.string(),
  created_at: timestamp,
});

export const listedPostSchema = z.object({
  id: z.string(),
  title: z.string(),
  status: z.string(),
  created_at: timestamp,
  updated_at: timestamp,
});

export const storedPostSchema = z.object({
  title: z.string(),
  html: z.string().nullable(),
  status: z.string(),
  updated_at: timestamp,
});

export const updatedPostSchema = z.object({
  id: z.string(),
  title: z.string(),
  url: z.string(),
  status: z.string(),
  updated_at: timestamp,
});

export const createPostResponseSchema = z.object({ posts: z.array(createdPostSchema).min(1) });
export const listPostsResponseSchema = z.object({ posts: z.array(listedPostSchema) });
export const readPostResponseSchema = z.object({ posts: z.array(storedPostSchema).min(1) });
export const updatePostResponseSchema = z.object({ posts: z.array(updatedPostSchema).min(1) });

export type CreatedPost = z.infer<typeof createdPostSchema>;
export type ListedPost = z.infer<typeof listedPostSchema>;
export type StoredPost = z.infer<typeof storedPostSchema>;
export type UpdatedPost = z.infer<typeof updatedPostSchema>;

export function describeZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validates a decoded response body against an endpoint schema
 */
export function decodeResponse<S extends z.ZodTypeAny>(
  schema: S,
  response: JsonObject
): Result<z.infer<S>, ResponseShapeError> {
  const parsed = schema.safeParse(response);
  if (!parsed.success) {
    return fail({
      kind: 'ResponseShapeError',
      message: describeZodError(parsed.error),
      response,
    });
  }
  return ok(parsed.data);
}
