/**
 * Decoded WKB batch to GeoJSON conversion.
 *
 * Builds the GeoJSON container matching each batch shape:
 * - points → one FeatureCollection of Point features
 * - point-sets → one FeatureCollection per element
 * - lines → one LineString or MultiLineString feature per element
 * - polygons → one Polygon or MultiPolygon feature per element
 *
 * Coordinates are copied, so the output never aliases the batch.
 *
 * @module
 */

import { assertValue } from "@wkbread/shared/assert"
import { rewindFeature } from "@placemarkio/geojson-rewind"
import {
	type BatchCrs,
	type Coordinate,
	type DecodedBatch,
	type LinesBatch,
	type PointSetsBatch,
	type PointsBatch,
	type PolygonsBatch,
	UNKNOWN_CRS,
} from "@wkbread/wkb"
import type {
	LineString,
	MultiLineString,
	MultiPolygon,
	Point,
	Polygon,
	Position,
} from "geojson"
import type {
	BatchToGeoJSONOptions,
	GeoJSONCRS,
	WkbFeature,
	WkbFeatureCollection,
	WkbGeoJSON,
	WkbGeoJSONGeometry,
} from "./types"

/**
 * Convert a decoded batch into GeoJSON.
 *
 * @param batch - Result of `decodeBatch`.
 * @param options - Output options.
 * @returns A FeatureCollection, or an array of them for MultiPoint batches.
 *
 * @example
 * ```ts
 * const geojson = batchToGeoJSON(decodeBatch(buffers, { crs: "EPSG:4326" }))
 * ```
 */
export function batchToGeoJSON(
	batch: DecodedBatch,
	options: BatchToGeoJSONOptions = {},
): WkbGeoJSON {
	switch (batch.shape) {
		case "points":
			return pointsToGeoJSON(batch)
		case "point-sets":
			return pointSetsToGeoJSON(batch)
		case "lines":
			return linesToGeoJSON(batch)
		case "polygons":
			return polygonsToGeoJSON(batch, options)
	}
}

/**
 * One Point feature per merged row, identified by the element's id.
 */
export function pointsToGeoJSON(
	batch: PointsBatch,
): WkbFeatureCollection<Point> {
	const features = batch.coordinates.map((coordinate, i) => {
		const id = batch.ids[i]
		assertValue(id, `No id for point ${i}`)
		return toFeature(id, point(coordinate))
	})
	return toCollection(features, batch.crs)
}

/**
 * One FeatureCollection per MultiPoint element.
 */
export function pointSetsToGeoJSON(
	batch: PointSetsBatch,
): WkbFeatureCollection<Point>[] {
	return batch.sets.map((set) => ({
		...toCollection(
			set.coordinates.map(
				(coordinate): WkbFeature<Point> => ({
					type: "Feature",
					geometry: point(coordinate),
					properties: { id: set.id },
				}),
			),
			batch.crs,
		),
		id: set.id,
	}))
}

export function linesToGeoJSON(
	batch: LinesBatch,
): WkbFeatureCollection<LineString | MultiLineString> {
	const features = batch.lines.map(({ id, paths }) => {
		if (batch.geometryType === "MultiLineString") {
			return toFeature<LineString | MultiLineString>(id, {
				type: "MultiLineString",
				coordinates: paths.map(positions),
			})
		}
		const path = paths[0]
		assertValue(path, `LineString ${id} has no path`)
		return toFeature<LineString | MultiLineString>(id, {
			type: "LineString",
			coordinates: positions(path),
		})
	})
	return toCollection(features, batch.crs)
}

export function polygonsToGeoJSON(
	batch: PolygonsBatch,
	options: BatchToGeoJSONOptions = {},
): WkbFeatureCollection<Polygon | MultiPolygon> {
	const features = batch.polygons.map(({ id, rings }) => {
		let geometry: Polygon | MultiPolygon
		if (batch.geometryType === "MultiPolygon") {
			geometry = {
				type: "MultiPolygon",
				coordinates: rings.map((polygon) => polygon.map(positions)),
			}
		} else {
			const polygon = rings[0]
			assertValue(polygon, `Polygon ${id} has no rings`)
			geometry = { type: "Polygon", coordinates: polygon.map(positions) }
		}
		return toFeature(id, options.rewind ? rewindPolygonal(geometry) : geometry)
	})
	return toCollection(features, batch.crs)
}

/**
 * Convert batch CRS metadata to a named GeoJSON CRS member.
 * Returns undefined when the CRS is unknown.
 */
export function toGeoJSONCRS(crs: BatchCrs): GeoJSONCRS | undefined {
	if (crs === UNKNOWN_CRS) return undefined
	if (typeof crs === "string") return { type: "name", properties: { name: crs } }
	return { type: "name", properties: { ...crs } }
}

function point(coordinate: Coordinate): Point {
	return { type: "Point", coordinates: [coordinate[0], coordinate[1]] }
}

function positions(coordinates: Coordinate[]): Position[] {
	return coordinates.map(([x, y]) => [x, y])
}

function toFeature<G extends WkbGeoJSONGeometry>(
	id: string,
	geometry: G,
): WkbFeature<G> {
	return { type: "Feature", id, geometry, properties: { id } }
}

function toCollection<G extends WkbGeoJSONGeometry>(
	features: WkbFeature<G>[],
	crs: BatchCrs,
): WkbFeatureCollection<G> {
	const crsMember = toGeoJSONCRS(crs)
	return crsMember
		? { type: "FeatureCollection", features, crs: crsMember }
		: { type: "FeatureCollection", features }
}

/**
 * Normalize winding order: exterior rings counterclockwise, holes clockwise.
 */
function rewindPolygonal(geometry: Polygon | MultiPolygon): Polygon | MultiPolygon {
	const rewound = rewindFeature({
		type: "Feature",
		geometry,
		properties: {},
	}).geometry
	if (rewound?.type === "Polygon" || rewound?.type === "MultiPolygon") {
		return rewound
	}
	return geometry
}
