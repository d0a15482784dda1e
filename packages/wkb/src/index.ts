/**
 * @wkbread/wkb - Decode OGC Well-Known Binary geometries.
 *
 * - **decodeOne**: decode one little endian, 2D WKB buffer into a tagged
 *   geometry value (Point, LineString, Polygon, MultiPoint, MultiLineString,
 *   or MultiPolygon).
 * - **decodeBatch**: decode a list of buffers that share one geometry type
 *   and aggregate them into the shape a container builder consumes.
 *
 * Big endian WKB, GeometryCollection, Z/M dimensions and EWKB SRIDs are
 * rejected with typed errors.
 *
 * @example
 * ```ts
 * import { decodeBatch, decodeOne } from "@wkbread/wkb"
 *
 * const point = decodeOne(wkb)
 * const batch = decodeBatch([wkbA, wkbB], { ids: ["a", "b"], crs: "EPSG:4326" })
 * ```
 *
 * @module @wkbread/wkb
 */

export * from "./batch"
export * from "./byte-cursor"
export * from "./decode"
export * from "./errors"
export * from "./readers"
export * from "./sequences"
export * from "./types"
