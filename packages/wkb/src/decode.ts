/**
 * Single-buffer WKB decoding.
 *
 * Reads one little endian, 2D WKB geometry front to back in a single pass.
 * Multi-geometries re-read and re-validate a full header for every member.
 *
 * @module
 */

import { ByteCursor } from "./byte-cursor"
import { NestedTypeMismatchError } from "./errors"
import { readCoordinate, readCount, readHeader } from "./readers"
import { readPointSequence, readRings } from "./sequences"
import type { Geometry, GeometryType } from "./types"

/**
 * Decode one WKB buffer into a {@link Geometry}.
 *
 * Bytes after the end of the geometry are ignored. The buffer is never
 * written to.
 *
 * @throws UnsupportedByteOrderError if any header is not little endian.
 * @throws UnsupportedGeometryTypeError for GeometryCollection.
 * @throws UnknownGeometryTypeError for codes outside 1-7.
 * @throws NestedTypeMismatchError if a multi-geometry member has the wrong type.
 * @throws TruncatedInputError if the buffer ends early.
 *
 * @example
 * ```ts
 * const point = decodeOne(hexToBytes("0101000000000000000000f03f0000000000000840"))
 * // { type: "Point", coordinates: [1, 3] }
 * ```
 */
export function decodeOne(wkb: Uint8Array): Geometry {
	return readGeometry(new ByteCursor(wkb))
}

function readGeometry(cursor: ByteCursor): Geometry {
	const header = readHeader(cursor)
	switch (header.type) {
		case "Point":
			return { type: "Point", coordinates: readCoordinate(cursor) }
		case "LineString":
			return { type: "LineString", coordinates: readPointSequence(cursor) }
		case "Polygon":
			return { type: "Polygon", coordinates: readRings(cursor) }
		case "MultiPoint":
			return {
				type: "MultiPoint",
				coordinates: readMembers(cursor, "MultiPoint", "Point", readCoordinate),
			}
		case "MultiLineString":
			return {
				type: "MultiLineString",
				coordinates: readMembers(
					cursor,
					"MultiLineString",
					"LineString",
					readPointSequence,
				),
			}
		case "MultiPolygon":
			return {
				type: "MultiPolygon",
				coordinates: readMembers(cursor, "MultiPolygon", "Polygon", readRings),
			}
	}
}

/**
 * Read a member count, then each member's header and body. Every header
 * must name the `member` type.
 */
function readMembers<T>(
	cursor: ByteCursor,
	container: GeometryType,
	member: GeometryType,
	readBody: (cursor: ByteCursor) => T,
): T[] {
	const count = readCount(cursor)
	const members: T[] = []
	for (let i = 0; i < count; i++) {
		const header = readHeader(cursor)
		if (header.type !== member) {
			throw new NestedTypeMismatchError(
				container,
				member,
				header.type,
				header.offset,
			)
		}
		members.push(readBody(cursor))
	}
	return members
}
