/**
 * Geometry values produced by the WKB decoder and the batch shapes built
 * from them.
 *
 * Geometries use GeoJSON-style `type`/`coordinates` members so they can be
 * handed to GeoJSON tooling without another conversion.
 *
 * @module
 */

import type { XY } from "@wkbread/shared/types"

/** A 2D position read from two little endian float64 values. */
export type Coordinate = XY

/** A closed boundary by convention. Closure is not checked. */
export type LinearRing = Coordinate[]

export interface PointGeometry {
	type: "Point"
	coordinates: Coordinate
}

export interface LineStringGeometry {
	type: "LineString"
	coordinates: Coordinate[]
}

/** Ring 0 is the exterior, any further rings are holes, as encoded. */
export interface PolygonGeometry {
	type: "Polygon"
	coordinates: LinearRing[]
}

export interface MultiPointGeometry {
	type: "MultiPoint"
	coordinates: Coordinate[]
}

export interface MultiLineStringGeometry {
	type: "MultiLineString"
	coordinates: Coordinate[][]
}

export interface MultiPolygonGeometry {
	type: "MultiPolygon"
	coordinates: LinearRing[][]
}

/** Exactly one variant per decoded buffer. */
export type Geometry =
	| PointGeometry
	| LineStringGeometry
	| PolygonGeometry
	| MultiPointGeometry
	| MultiLineStringGeometry
	| MultiPolygonGeometry

export type GeometryType = Geometry["type"]

/**
 * Coordinate reference system metadata passed through a batch untouched.
 */
export interface CrsDescriptor {
	name: string
	[key: string]: unknown
}

/** A CRS name (e.g. `"EPSG:4326"`, a proj string) or a structured descriptor. */
export type Crs = string | CrsDescriptor

/** Marker used when no CRS was supplied. */
export const UNKNOWN_CRS = null

export type BatchCrs = Crs | typeof UNKNOWN_CRS

/**
 * All-Point batch: the points of every element merged into one table, in
 * input order.
 */
export interface PointsBatch {
	shape: "points"
	coordinates: Coordinate[]
	ids: string[]
	crs: BatchCrs
}

export interface PointSet {
	id: string
	coordinates: Coordinate[]
}

/**
 * All-MultiPoint batch: one independent point set per input element.
 */
export interface PointSetsBatch {
	shape: "point-sets"
	sets: PointSet[]
	crs: BatchCrs
}

export interface LinePaths {
	id: string
	/** One path for a LineString, one per member for a MultiLineString. */
	paths: Coordinate[][]
}

/**
 * All-LineString or all-MultiLineString batch: one path group per element.
 */
export interface LinesBatch {
	shape: "lines"
	geometryType: "LineString" | "MultiLineString"
	lines: LinePaths[]
	crs: BatchCrs
}

export interface PolygonRings {
	id: string
	/** Ring lists, one per polygon. A Polygon element contributes one. */
	rings: LinearRing[][]
}

/**
 * All-Polygon or all-MultiPolygon batch: one ring group per element.
 */
export interface PolygonsBatch {
	shape: "polygons"
	geometryType: "Polygon" | "MultiPolygon"
	polygons: PolygonRings[]
	crs: BatchCrs
}

export type DecodedBatch =
	| PointsBatch
	| PointSetsBatch
	| LinesBatch
	| PolygonsBatch
