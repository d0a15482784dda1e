/**
 * WKB buffer writers for tests.
 *
 * Builds little endian WKB with DataView so tests can describe geometries
 * as coordinates instead of hand-written byte arrays. The raw helpers
 * (`wkbHeader`, `wkbCollection`) allow malformed buffers: wrong byte order
 * flags, unsupported type codes and mismatched members.
 */

import { concatBytes } from "@wkbread/shared/concat-bytes"
import type { XY } from "@wkbread/shared/types"

export const WKB_POINT = 1
export const WKB_LINESTRING = 2
export const WKB_POLYGON = 3
export const WKB_MULTIPOINT = 4
export const WKB_MULTILINESTRING = 5
export const WKB_MULTIPOLYGON = 6
export const WKB_GEOMETRYCOLLECTION = 7

export function uint32LE(value: number): Uint8Array {
	const bytes = new Uint8Array(4)
	new DataView(bytes.buffer).setUint32(0, value, true)
	return bytes
}

export function float64LE(value: number): Uint8Array {
	const bytes = new Uint8Array(8)
	new DataView(bytes.buffer).setFloat64(0, value, true)
	return bytes
}

/**
 * Byte order flag followed by a uint32 type code. The type code is always
 * written little endian, whatever flag is given.
 */
export function wkbHeader(typeCode: number, byteOrder = 1): Uint8Array {
	return concatBytes([new Uint8Array([byteOrder]), uint32LE(typeCode)])
}

function coordinate([x, y]: XY): Uint8Array {
	return concatBytes([float64LE(x), float64LE(y)])
}

function pointSequence(coords: XY[]): Uint8Array {
	return concatBytes([uint32LE(coords.length), ...coords.map(coordinate)])
}

function rings(polygon: XY[][]): Uint8Array {
	return concatBytes([uint32LE(polygon.length), ...polygon.map(pointSequence)])
}

export function wkbPoint(x: number, y: number): Uint8Array {
	return concatBytes([wkbHeader(WKB_POINT), coordinate([x, y])])
}

export function wkbLineString(coords: XY[]): Uint8Array {
	return concatBytes([wkbHeader(WKB_LINESTRING), pointSequence(coords)])
}

export function wkbPolygon(polygon: XY[][]): Uint8Array {
	return concatBytes([wkbHeader(WKB_POLYGON), rings(polygon)])
}

/**
 * A multi-geometry or collection header, member count and the given
 * already-encoded members.
 */
export function wkbCollection(typeCode: number, members: Uint8Array[]): Uint8Array {
	return concatBytes([wkbHeader(typeCode), uint32LE(members.length), ...members])
}

export function wkbMultiPoint(points: XY[]): Uint8Array {
	return wkbCollection(
		WKB_MULTIPOINT,
		points.map(([x, y]) => wkbPoint(x, y)),
	)
}

export function wkbMultiLineString(lines: XY[][]): Uint8Array {
	return wkbCollection(WKB_MULTILINESTRING, lines.map(wkbLineString))
}

export function wkbMultiPolygon(polygons: XY[][][]): Uint8Array {
	return wkbCollection(WKB_MULTIPOLYGON, polygons.map(wkbPolygon))
}
