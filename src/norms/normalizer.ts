import type { NormalizedArgs } from '../core/values.js';

/**
 * Adapts the arguments a web framework hands to a request handler into the
 * normalized submission shape: variable name → string, list of strings,
 * bytes or upload handle.
 */
export interface Normalizer<TRaw> {
  normalize(raw: TRaw): NormalizedArgs;
}
