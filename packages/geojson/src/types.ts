/**
 * Type definitions for WKB batch to GeoJSON conversion.
 * @module
 */

import type {
	Feature,
	FeatureCollection,
	LineString,
	MultiLineString,
	MultiPolygon,
	Point,
	Polygon,
} from "geojson"

/**
 * Named CRS member from the 2008 GeoJSON format. RFC 7946 dropped `crs`,
 * but GIS tools still read it as a foreign member.
 */
export interface GeoJSONCRS {
	type: "name"
	properties: {
		name: string
		[key: string]: unknown
	}
}

/** Every feature carries the id of the batch element it came from. */
export type WkbFeatureProperties = {
	id: string
}

export type WkbGeoJSONGeometry =
	| Point
	| LineString
	| MultiLineString
	| Polygon
	| MultiPolygon

export type WkbFeature<G extends WkbGeoJSONGeometry = WkbGeoJSONGeometry> =
	Feature<G, WkbFeatureProperties>

/**
 * FeatureCollection with the optional `id` and `crs` foreign members.
 */
export type WkbFeatureCollection<
	G extends WkbGeoJSONGeometry = WkbGeoJSONGeometry,
> = FeatureCollection<G, WkbFeatureProperties> & {
	id?: string
	crs?: GeoJSONCRS
}

/**
 * GeoJSON built from a batch: one collection, or one collection per element
 * for MultiPoint batches.
 */
export type WkbGeoJSON = WkbFeatureCollection | WkbFeatureCollection<Point>[]

export interface BatchToGeoJSONOptions {
	/** Rewind polygon rings to RFC 7946 winding (exterior counterclockwise). */
	rewind?: boolean
}
