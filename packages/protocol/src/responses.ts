/**
 * Response body schemas
 *
 * The API uses PascalCase field names. Unknown fields are dropped, so newer
 * servers that add fields (e.g. BlockSize on object/stat) still validate.
 */

import { z } from "zod";

/**
 * GET resolve
 */
export const ResolveResponseSchema = z.object({
  Path: z.string(),
});

export type ResolveResponse = z.infer<typeof ResolveResponseSchema>;

/**
 * POST object/put
 */
export const PutResponseSchema = z.object({
  Hash: z.string().min(1),
});

export type PutResponse = z.infer<typeof PutResponseSchema>;

const sizeSchema = z.number().int().nonnegative();

/**
 * GET object/stat
 */
export const StatResponseSchema = z.object({
  Hash: z.string().min(1),
  NumLinks: sizeSchema,
  DataSize: sizeSchema,
  CumulativeSize: sizeSchema,
});

export type StatResponse = z.infer<typeof StatResponseSchema>;
