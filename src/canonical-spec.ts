/**
 * Field Digest Canonical Form -- Specification
 *
 * This module documents the exact rules implemented by canonicalize.ts and
 * encoder.ts.
 *
 * Rules:
 *
 * 1. FIELD SELECTION: Only fields registered for a value's class (or one of
 *    its ancestor classes) appear in the canonical form. A class with nothing
 *    registered in its chain canonicalizes to the empty map.
 *
 * 2. FIELD ORDER: The class's own fields come first, stably sorted by their
 *    order key (ties keep registration order). Each ancestor's fields follow,
 *    nearest ancestor first, each group sorted on its own. Keys are NEVER
 *    sorted lexicographically.
 *
 * 3. ABSENT VALUES: null and undefined are pruned. A field holding either is
 *    omitted; a collection element holding either is skipped. An absent root
 *    canonicalizes to the empty map.
 *
 * 4. COLLECTIONS: Arrays and Sets become lists in iteration order. Elements
 *    are never sorted, so reordering a collection changes the digest.
 *
 * 5. SCALARS: string, boolean, number, bigint and Date are leaves.
 *    - number: JSON formatting, -0 written as 0. NaN and Infinity are
 *      rejected.
 *    - bigint: decimal digits, written as a JSON number.
 *    - Date: JSON string of toISOString(). Invalid dates are rejected.
 *      This differs on purpose from an epoch-milliseconds number, so a
 *      Date never hashes like the number it wraps.
 *
 * 6. EVERYTHING ELSE that is an object is a nested value and canonicalized by
 *    rules 1-5. Symbols and functions are rejected.
 *    Map, typed arrays (Uint8Array etc.) and boxed primitives
 *    (new String('x')) are nested values too: they have no registered
 *    fields, so they canonicalize to {} and their contents never affect the
 *    digest.
 *
 * 7. NO WHITESPACE: No spaces, no newlines. Compact JSON only, UTF-8 bytes.
 *
 * 8. CYCLES: An object that is its own ancestor is rejected. Shared
 *    references that are not ancestors are canonicalized at each occurrence.
 */

/** Default nesting limit for canonicalize(). */
export const DEFAULT_MAX_DEPTH = 256;

/** Path prefix used in error messages. */
export const ROOT_PATH = '$';
