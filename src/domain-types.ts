/**
 * Document registry domain primitives
 */

// === BRANDED TYPES ===
export type HashCode = string & { readonly brand: 'HashCode' };
export type ShortCode = string & { readonly brand: 'ShortCode' };
export type ContentHash = string & { readonly brand: 'ContentHash' };
export type OwnerNamespace = string & { readonly brand: 'OwnerNamespace' };
export type TraceId = string & { readonly brand: 'TraceId' };

// === RESULT ===
export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Result = {
  ok: <T>(value: T): Result<T, never> => ({ ok: true, value }),
  err: <E>(error: E): Result<never, E> => ({ ok: false, error }),
};

// === OWNER NAMESPACE ===
export const OwnerNamespace = {
  /**
   * Maps anything outside [A-Za-z0-9_-] to '_' so the namespace is safe to use as a
   * directory name. Returns null when nothing is left.
   */
  sanitize: (input: string): OwnerNamespace | null => {
    const safe = input.trim().replace(/[^a-zA-Z0-9_-]/g, '_');
    return safe.length > 0 ? (safe as OwnerNamespace) : null;
  },
};
