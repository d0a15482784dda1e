/**
 * @wkbread/shared - Helpers shared by the wkbread packages.
 *
 * - Progress events used for logging by long-running entry points.
 * - Assertions, byte concatenation and hex transcoding.
 * - Coordinate tuple types.
 *
 * Prefer the subpath imports (`@wkbread/shared/progress`) inside the
 * monorepo; this barrel exists for consumers.
 *
 * @module @wkbread/shared
 */

export * from "./assert"
export * from "./concat-bytes"
export * from "./hex"
export * from "./progress"
export type * from "./types"
