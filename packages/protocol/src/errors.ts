/**
 * Remote error body and recognised error messages
 */

import { z } from "zod";

/**
 * Body of every non-2xx response
 */
export const ErrorResponseSchema = z.object({
  Message: z.string(),
  Code: z.number().int().nonnegative(),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// ============================================================================
// Recognised Messages
// ============================================================================

/** pin/rm on something that is not pinned */
export const NOT_PINNED = "not pinned";

/** The server could not parse the ref it was given */
export const INVALID_REF = "invalid ipfs ref path";
