import {
	logProgress,
	type ProgressEvent,
	progressEvent,
} from "@wkbread/shared/progress"
import {
	type DecodeBatchOptions,
	decodeBatch,
	type WkbBatchInput,
} from "@wkbread/wkb"
import { batchToGeoJSON } from "./batch-to-geojson"
import type { BatchToGeoJSONOptions, WkbGeoJSON } from "./types"

export interface ReadWkbOptions
	extends DecodeBatchOptions,
		BatchToGeoJSONOptions {}

/**
 * Decode a batch of WKB buffers and build GeoJSON from it.
 *
 * The geometry types map to GeoJSON containers as follows:
 * - Point → FeatureCollection of Points
 * - LineString/MultiLineString → FeatureCollection of (Multi)LineStrings
 * - Polygon/MultiPolygon → FeatureCollection of (Multi)Polygons
 * - MultiPoint → array of FeatureCollections, one per buffer
 *
 * @param wkb - Buffer or buffers of one geometry type.
 * @param options - Element ids, CRS metadata and output options.
 * @param onProgress - Progress callback, logs to the console by default.
 *
 * @example
 * ```ts
 * import { readWkb } from "@wkbread/geojson"
 * import { hexToBytes } from "@wkbread/shared/hex"
 *
 * const geojson = readWkb(rows.map((row) => hexToBytes(row.geom)), {
 *   ids: rows.map((row) => row.name),
 *   crs: "EPSG:4326",
 * })
 * ```
 */
export function readWkb(
	wkb: WkbBatchInput,
	options: ReadWkbOptions = {},
	onProgress: (progress: ProgressEvent) => void = logProgress,
): WkbGeoJSON {
	const batch = decodeBatch(wkb, options, onProgress)
	onProgress(progressEvent(`Building GeoJSON for ${batch.shape}...`))
	return batchToGeoJSON(batch, options)
}
