/**
 * Fixed-width WKB field readers built on {@link ByteCursor}.
 *
 * @module
 */

import type { ByteCursor } from "./byte-cursor"
import {
	UnknownGeometryTypeError,
	UnsupportedByteOrderError,
	UnsupportedGeometryTypeError,
} from "./errors"
import type { Coordinate, GeometryType } from "./types"

/** Byte order flag value for little endian (NDR) encoding. */
export const WKB_LITTLE_ENDIAN = 0x01

export type ByteOrder = "LittleEndian" | "Other"

/** OGC type codes for the 2D geometry types the decoder reads. */
export const WKB_TYPE_CODES = {
	Point: 1,
	LineString: 2,
	Polygon: 3,
	MultiPoint: 4,
	MultiLineString: 5,
	MultiPolygon: 6,
} as const satisfies Record<GeometryType, number>

const GEOMETRY_COLLECTION_CODE = 7

// EWKB flag bits for Z, M and an embedded SRID
const EWKB_FLAGS = 0x80000000 | 0x40000000 | 0x20000000

export type TypeCodeClass =
	| { kind: "supported"; type: GeometryType }
	| { kind: "unsupported"; name: "GeometryCollection" }
	| { kind: "unknown"; code: number }

export interface WkbHeader {
	/** Offset of the byte order flag that starts this header. */
	offset: number
	typeCode: number
	type: GeometryType
}

export function readByteOrderFlag(cursor: ByteCursor): ByteOrder {
	return cursor.readUint8() === WKB_LITTLE_ENDIAN ? "LittleEndian" : "Other"
}

export function readTypeCode(cursor: ByteCursor): number {
	return cursor.readUint32LE()
}

export function readCoordinateValue(cursor: ByteCursor): number {
	return cursor.readFloat64LE()
}

/** Point, ring and member counts are all uint32. */
export function readCount(cursor: ByteCursor): number {
	return cursor.readUint32LE()
}

export function readCoordinate(cursor: ByteCursor): Coordinate {
	const x = readCoordinateValue(cursor)
	const y = readCoordinateValue(cursor)
	return [x, y]
}

/**
 * Map a raw type code to the geometry type it names, keeping the
 * recognized-but-unsupported GeometryCollection apart from unknown codes.
 */
export function classifyTypeCode(code: number): TypeCodeClass {
	switch (code) {
		case WKB_TYPE_CODES.Point:
			return { kind: "supported", type: "Point" }
		case WKB_TYPE_CODES.LineString:
			return { kind: "supported", type: "LineString" }
		case WKB_TYPE_CODES.Polygon:
			return { kind: "supported", type: "Polygon" }
		case WKB_TYPE_CODES.MultiPoint:
			return { kind: "supported", type: "MultiPoint" }
		case WKB_TYPE_CODES.MultiLineString:
			return { kind: "supported", type: "MultiLineString" }
		case WKB_TYPE_CODES.MultiPolygon:
			return { kind: "supported", type: "MultiPolygon" }
		case GEOMETRY_COLLECTION_CODE:
			return { kind: "unsupported", name: "GeometryCollection" }
		default:
			return { kind: "unknown", code }
	}
}

function unknownTypeMessage(code: number): string {
	if ((code & EWKB_FLAGS) !== 0) {
		return `Unknown WKB geometry type code 0x${code.toString(16)}: EWKB Z, M and SRID flags are not supported`
	}
	if (code >= 1000) {
		return `Unknown WKB geometry type code ${code}: Z and M dimensions are not supported`
	}
	return `Unknown WKB geometry type code ${code}: supported types are Point, LineString, Polygon, MultiPoint, MultiLineString, and MultiPolygon`
}

/**
 * Read a byte order flag and type code, rejecting anything but a little
 * endian header for one of the six supported types.
 */
export function readHeader(cursor: ByteCursor): WkbHeader {
	const offset = cursor.position
	if (readByteOrderFlag(cursor) !== "LittleEndian") {
		throw new UnsupportedByteOrderError(offset)
	}
	const typeCode = readTypeCode(cursor)
	const typeClass = classifyTypeCode(typeCode)
	switch (typeClass.kind) {
		case "supported":
			return { offset, typeCode, type: typeClass.type }
		case "unsupported":
			throw new UnsupportedGeometryTypeError(typeClass.name, offset)
		case "unknown":
			throw new UnknownGeometryTypeError(
				unknownTypeMessage(typeClass.code),
				typeClass.code,
				offset,
			)
	}
}
