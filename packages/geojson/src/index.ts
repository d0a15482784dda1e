/**
 * @wkbread/geojson - Build GeoJSON from decoded WKB batches.
 *
 * - **batchToGeoJSON**: turn a `DecodedBatch` into FeatureCollections.
 * - **readWkb**: decode WKB buffers and build GeoJSON in one call.
 *
 * The batch CRS is written as a named `crs` member. Polygon winding can be
 * normalized to RFC 7946 with the `rewind` option.
 *
 * @example
 * ```ts
 * import { readWkb } from "@wkbread/geojson"
 *
 * const collection = readWkb([wkbA, wkbB], { ids: ["a", "b"], rewind: true })
 * ```
 *
 * @module @wkbread/geojson
 */

export * from "./batch-to-geojson"
export * from "./read-wkb"
export type * from "./types"
