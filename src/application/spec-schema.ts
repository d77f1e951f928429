import { z } from 'zod';

/**
 * Zod schema for the `download_config_specs` response body.
 *
 * - Both spec lists default to empty when absent.
 * - Each list item must be a JSON object; whether it has a usable `name` is
 *   decided later by the SpecStore, which drops nameless entries.
 * - `time` is the server's sync cursor, echoed back as `sinceTime` on the
 *   next request. Defaults to 0 (full resync).
 */
const rawSpecSchema = z.record(z.string(), z.unknown());

export const specDocumentSchema = z
  .object({
    feature_gates: z.array(rawSpecSchema).default([]),
    dynamic_configs: z.array(rawSpecSchema).default([]),
    time: z.number().int().nonnegative().default(0),
  })
  .passthrough();

export type SpecDocument = z.infer<typeof specDocumentSchema>;

export type SpecDocumentParseResult =
  | { readonly success: true; readonly document: SpecDocument }
  | { readonly success: false; readonly error: unknown };

/**
 * Parses a raw response body into a SpecDocument.
 * Invalid JSON and schema violations both come back as `success: false`;
 * this function never throws.
 */
export function parseSpecDocument(body: string): SpecDocumentParseResult {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err: unknown) {
    return { success: false, error: err };
  }

  const parsed = specDocumentSchema.safeParse(json);
  if (!parsed.success) {
    return { success: false, error: parsed.error };
  }
  return { success: true, document: parsed.data };
}
