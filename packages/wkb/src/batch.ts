/**
 * Batch WKB decoding and aggregation.
 *
 * Decodes every buffer of a batch, checks that all of them share one
 * geometry type, and reshapes the results into the {@link DecodedBatch}
 * shape a container builder consumes:
 *
 * - Point → one merged point table
 * - MultiPoint → one point set per element
 * - LineString/MultiLineString → one path group per element
 * - Polygon/MultiPolygon → one ring group per element
 *
 * @module
 */

import { assertValue } from "@wkbread/shared/assert"
import { type ProgressEvent, progressEvent } from "@wkbread/shared/progress"
import { decodeOne } from "./decode"
import { InvalidInputError, MixedGeometryTypeError, WkbError } from "./errors"
import {
	type Crs,
	type DecodedBatch,
	type Geometry,
	type GeometryType,
	UNKNOWN_CRS,
} from "./types"

/**
 * A single WKB buffer, or a list of buffers decoded as one batch.
 */
export type WkbBatchInput = Uint8Array | readonly Uint8Array[]

export interface DecodeBatchOptions {
	/** One unique id per buffer. Defaults to "1", "2", ... in input order. */
	ids?: readonly string[]
	/** Passed through to the result untouched. */
	crs?: Crs
}

type GeometryOfType<T extends GeometryType> = Extract<Geometry, { type: T }>

/**
 * Decode a batch of WKB buffers that all hold the same geometry type.
 *
 * A single `Uint8Array` is treated as a batch of one when `ids` is absent or
 * has exactly one entry.
 *
 * @param wkb - Buffer or buffers to decode.
 * @param options - Element ids and CRS metadata.
 * @param onProgress - Optional progress callback, called at start and end.
 * @returns The aggregate shape for the batch's geometry type.
 * @throws InvalidInputError before decoding if the arguments are malformed.
 * @throws MixedGeometryTypeError if the elements decode to different types.
 * @throws WkbError subclasses from {@link decodeOne}, annotated with the
 * failing element's index and id.
 *
 * @example
 * ```ts
 * const batch = decodeBatch([pointA, pointB], { crs: "EPSG:4326" })
 * if (batch.shape === "points") console.log(batch.coordinates)
 * ```
 */
export function decodeBatch(
	wkb: WkbBatchInput,
	options: DecodeBatchOptions = {},
	onProgress?: (progress: ProgressEvent) => void,
): DecodedBatch {
	const buffers = toBufferList(wkb, options.ids)
	const ids = resolveIds(buffers.length, options.ids)
	const crs = options.crs ?? UNKNOWN_CRS

	onProgress?.(progressEvent(`Decoding ${buffers.length} WKB geometries...`))

	const geometries = buffers.map((buffer, index) =>
		decodeElement(buffer, index, idAt(ids, index)),
	)

	const first = geometries[0]
	assertValue(first, "Batch decoded no geometries")
	const types = [...new Set(geometries.map((g) => g.type))]
	if (types.length > 1) {
		const index = geometries.findIndex((g) => g.type !== first.type)
		throw new MixedGeometryTypeError(types, index).withElement(
			index,
			idAt(ids, index),
		)
	}

	const batch = aggregate(first.type, geometries, ids, crs)
	onProgress?.(
		progressEvent(`Decoded ${geometries.length} ${first.type} geometries`),
	)
	return batch
}

function aggregate(
	type: GeometryType,
	geometries: Geometry[],
	ids: string[],
	crs: DecodedBatch["crs"],
): DecodedBatch {
	switch (type) {
		case "Point":
			return {
				shape: "points",
				coordinates: ofType(geometries, "Point").map((g) => g.coordinates),
				ids,
				crs,
			}
		case "MultiPoint":
			return {
				shape: "point-sets",
				sets: ofType(geometries, "MultiPoint").map((g, i) => ({
					id: idAt(ids, i),
					coordinates: g.coordinates,
				})),
				crs,
			}
		case "LineString":
			return {
				shape: "lines",
				geometryType: "LineString",
				lines: ofType(geometries, "LineString").map((g, i) => ({
					id: idAt(ids, i),
					paths: [g.coordinates],
				})),
				crs,
			}
		case "MultiLineString":
			return {
				shape: "lines",
				geometryType: "MultiLineString",
				lines: ofType(geometries, "MultiLineString").map((g, i) => ({
					id: idAt(ids, i),
					paths: g.coordinates,
				})),
				crs,
			}
		case "Polygon":
			return {
				shape: "polygons",
				geometryType: "Polygon",
				polygons: ofType(geometries, "Polygon").map((g, i) => ({
					id: idAt(ids, i),
					rings: [g.coordinates],
				})),
				crs,
			}
		case "MultiPolygon":
			return {
				shape: "polygons",
				geometryType: "MultiPolygon",
				polygons: ofType(geometries, "MultiPolygon").map((g, i) => ({
					id: idAt(ids, i),
					rings: g.coordinates,
				})),
				crs,
			}
	}
}

function decodeElement(buffer: Uint8Array, index: number, id: string) {
	try {
		return decodeOne(buffer)
	} catch (error) {
		if (error instanceof WkbError) throw error.withElement(index, id)
		throw error
	}
}

function isOfType<T extends GeometryType>(
	geometry: Geometry,
	type: T,
): geometry is GeometryOfType<T> {
	return geometry.type === type
}

/**
 * Narrow an already homogeneous geometry list to its type.
 */
function ofType<T extends GeometryType>(
	geometries: Geometry[],
	type: T,
): GeometryOfType<T>[] {
	const matches: GeometryOfType<T>[] = []
	for (const geometry of geometries) {
		if (isOfType(geometry, type)) matches.push(geometry)
	}
	return matches
}

function idAt(ids: string[], index: number): string {
	const id = ids[index]
	assertValue(id, `No id for element ${index}`)
	return id
}

function describeValue(value: unknown): string {
	if (value === null) return "null"
	if (Array.isArray(value)) return "an array"
	return typeof value === "object"
		? (value.constructor?.name ?? "object")
		: typeof value
}

function toBufferList(
	wkb: WkbBatchInput,
	ids: readonly string[] | undefined,
): Uint8Array[] {
	if (wkb instanceof Uint8Array) {
		if (ids === undefined || ids.length === 1) return [wkb]
		throw new InvalidInputError(
			`wkb and ids must have the same length, got a single buffer and ${ids.length} ids`,
		)
	}
	const list: unknown = wkb
	if (!Array.isArray(list)) {
		throw new InvalidInputError(
			`wkb must be a Uint8Array or an array of Uint8Arrays, got ${describeValue(list)}`,
		)
	}
	if (list.length < 1) {
		throw new InvalidInputError("wkb must have length 1 or greater")
	}
	const buffers: Uint8Array[] = []
	for (let index = 0; index < list.length; index++) {
		const item: unknown = list[index]
		if (!(item instanceof Uint8Array)) {
			throw new InvalidInputError(
				`Each element of wkb must be a Uint8Array, element ${index} is ${describeValue(item)}`,
				{ index },
			)
		}
		buffers.push(item)
	}
	return buffers
}

function resolveIds(count: number, ids: readonly string[] | undefined): string[] {
	if (ids === undefined) {
		return Array.from({ length: count }, (_, i) => String(i + 1))
	}
	const list: unknown = ids
	if (!Array.isArray(list)) {
		throw new InvalidInputError(
			`ids must be an array of strings, got ${describeValue(list)}`,
		)
	}
	if (list.length !== count) {
		throw new InvalidInputError(
			`wkb and ids must have the same length, got ${count} buffers and ${list.length} ids`,
		)
	}
	const seen = new Set<string>()
	const resolved: string[] = []
	for (let index = 0; index < list.length; index++) {
		const id: unknown = list[index]
		if (typeof id !== "string") {
			throw new InvalidInputError(
				`Each id must be a string, id ${index} is ${describeValue(id)}`,
				{ index },
			)
		}
		if (seen.has(id)) {
			throw new InvalidInputError(`ids must be unique, "${id}" is repeated`, {
				index,
				id,
			})
		}
		seen.add(id)
		resolved.push(id)
	}
	return resolved
}
