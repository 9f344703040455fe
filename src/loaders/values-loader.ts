/**
 * Built-in `values` loader: the info block is itself the objects.
 *
 * ```yaml
 * values:
 *   sample_rate: 120
 *   operator: beamline-staff
 * ```
 */

import type { Loader } from "./types.js";

export const valuesLoader: Loader = {
  loadObjs(info: unknown): unknown {
    if (info === null || info === undefined) return {};
    if (typeof info !== "object" || Array.isArray(info)) {
      throw new TypeError("values: expected a mapping of name to value");
    }
    return info;
  },
};
