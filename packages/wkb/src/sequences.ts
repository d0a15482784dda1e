import type { ByteCursor } from "./byte-cursor"
import { readCoordinate, readCount } from "./readers"
import type { Coordinate, LinearRing } from "./types"

/**
 * Read a point count followed by that many coordinates.
 * Shared by LineString bodies and polygon rings.
 */
export function readPointSequence(cursor: ByteCursor): Coordinate[] {
	const count = readCount(cursor)
	const points: Coordinate[] = []
	for (let i = 0; i < count; i++) {
		points.push(readCoordinate(cursor))
	}
	return points
}

/**
 * Read a ring count followed by that many point sequences, exterior first.
 */
export function readRings(cursor: ByteCursor): LinearRing[] {
	const count = readCount(cursor)
	const rings: LinearRing[] = []
	for (let i = 0; i < count; i++) {
		rings.push(readPointSequence(cursor))
	}
	return rings
}
