/**
 * Response codecs
 *
 * A codec names the `encoding` query value the server should answer in and
 * parses the response body. Parse failures become INVALID_DATA.
 */

import type { z } from "zod";
import { createApiError, isApiError } from "./utils/errors.ts";

export type Codec<T> = {
  /** Value of the `encoding` query parameter, or null to leave it out */
  readonly encoding: string | null;
  parse: (body: Uint8Array) => T;
};

const textDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Discard the body.
 */
export const ignoreCodec: Codec<void> = {
  encoding: null,
  parse: () => undefined,
};

/**
 * Decode a UTF-8 JSON body and validate it against a zod schema.
 */
export const jsonCodec = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): Codec<T> => ({
  encoding: "json",
  parse: (body) => {
    let value: unknown;
    try {
      value = JSON.parse(textDecoder.decode(body));
    } catch (err) {
      throw createApiError(
        "INVALID_DATA",
        `Invalid JSON response: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
    const result = schema.safeParse(value);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
        .join("; ");
      throw createApiError("INVALID_DATA", `Unexpected response shape: ${issues}`, {
        cause: result.error,
      });
    }
    return result.data;
  },
});

/**
 * Decode a binary protobuf body with the given message decoder.
 */
export const protobufCodec = <T>(decode: (body: Uint8Array) => T): Codec<T> => ({
  encoding: "protobuf",
  parse: (body) => {
    try {
      return decode(body);
    } catch (err) {
      if (isApiError(err)) throw err;
      throw createApiError(
        "INVALID_DATA",
        `Invalid protobuf response: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
  },
});
