/**
 * Loader plugin contract.
 *
 * One loader serves one config header. It receives the header's info block
 * as parsed from the config file and returns the objects it built, as a
 * Map, a plain record or an iterable of [name, object] pairs. Failures are
 * the dispatcher's to catch, not the loader's.
 */

export interface Loader {
  loadObjs(info: unknown): unknown;
}
