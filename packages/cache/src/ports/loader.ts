/**
 * Computes the value for a key from the backing source.
 *
 * Resolve with `null` when the source confirms there is no value (cached as a
 * negative result); reject to signal failure (nothing is cached).
 */
export type Loader<T> = () => Promise<T | null>
