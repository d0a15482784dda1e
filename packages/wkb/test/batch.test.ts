import {
	type ProgressEvent,
	progressEventMessage,
} from "@wkbread/shared/progress"
import {
	wkbLineString,
	wkbMultiLineString,
	wkbMultiPoint,
	wkbMultiPolygon,
	wkbPoint,
	wkbPolygon,
} from "@wkbread/test-utils/wkb"
import { describe, expect, it, vi } from "vitest"
import { decodeBatch } from "../src/batch"
import {
	InvalidInputError,
	MixedGeometryTypeError,
	TruncatedInputError,
	UnsupportedByteOrderError,
} from "../src/errors"

const triangle: [number, number][] = [
	[0, 0],
	[4, 0],
	[0, 3],
	[0, 0],
]

describe("decodeBatch", () => {
	it("merges Point buffers into one point table", () => {
		expect(decodeBatch([wkbPoint(1, 3), wkbPoint(2, 2)])).toEqual({
			shape: "points",
			coordinates: [
				[1, 3],
				[2, 2],
			],
			ids: ["1", "2"],
			crs: null,
		})
	})

	it("keeps MultiPoint buffers as separate point sets", () => {
		const batch = decodeBatch([wkbMultiPoint([[2, 3]]), wkbMultiPoint([[2, 2]])])
		expect(batch).toEqual({
			shape: "point-sets",
			sets: [
				{ id: "1", coordinates: [[2, 3]] },
				{ id: "2", coordinates: [[2, 2]] },
			],
			crs: null,
		})
	})

	it("gives each LineString one path", () => {
		const batch = decodeBatch(
			[
				wkbLineString([
					[1, 3],
					[2, 2],
				]),
				wkbLineString([
					[1, 1],
					[2, 1.5],
				]),
			],
			{ ids: ["a", "b"] },
		)
		expect(batch).toEqual({
			shape: "lines",
			geometryType: "LineString",
			lines: [
				{
					id: "a",
					paths: [
						[
							[1, 3],
							[2, 2],
						],
					],
				},
				{
					id: "b",
					paths: [
						[
							[1, 1],
							[2, 1.5],
						],
					],
				},
			],
			crs: null,
		})
	})

	it("gives each MultiLineString one path per member", () => {
		const batch = decodeBatch(
			wkbMultiLineString([
				[
					[0, 0],
					[1, 1],
				],
				[
					[2, 2],
					[3, 3],
				],
			]),
		)
		expect(batch.shape).toBe("lines")
		if (batch.shape === "lines") {
			expect(batch.geometryType).toBe("MultiLineString")
			expect(batch.lines).toHaveLength(1)
			expect(batch.lines[0]?.id).toBe("1")
			expect(batch.lines[0]?.paths).toEqual([
				[
					[0, 0],
					[1, 1],
				],
				[
					[2, 2],
					[3, 3],
				],
			])
		}
	})

	it("gives each Polygon one ring group", () => {
		const batch = decodeBatch([wkbPolygon([triangle])], {
			ids: ["San Francisco"],
			crs: "EPSG:4326",
		})
		expect(batch).toEqual({
			shape: "polygons",
			geometryType: "Polygon",
			polygons: [{ id: "San Francisco", rings: [[triangle]] }],
			crs: "EPSG:4326",
		})
	})

	it("keeps the polygons of a MultiPolygon in one ring group", () => {
		const batch = decodeBatch([
			wkbMultiPolygon([[triangle], [triangle]]),
			wkbMultiPolygon([[triangle]]),
		])
		expect(batch.shape).toBe("polygons")
		if (batch.shape === "polygons") {
			expect(batch.geometryType).toBe("MultiPolygon")
			expect(batch.polygons.map((p) => p.id)).toEqual(["1", "2"])
			expect(batch.polygons[0]?.rings).toEqual([[triangle], [triangle]])
			expect(batch.polygons[1]?.rings).toEqual([[triangle]])
		}
	})

	it("passes a structured CRS through untouched", () => {
		const crs = { name: "urn:ogc:def:crs:EPSG::3857", authority: "EPSG" }
		const batch = decodeBatch([wkbPoint(0, 0)], { crs })
		expect(batch.crs).toBe(crs)
	})

	it("preserves input order for larger batches", () => {
		const buffers = Array.from({ length: 50 }, (_, i) => wkbPoint(i, -i))
		const batch = decodeBatch(buffers)
		expect(batch.shape).toBe("points")
		if (batch.shape === "points") {
			expect(batch.coordinates).toHaveLength(50)
			expect(batch.coordinates[49]).toEqual([49, -49])
			expect(batch.ids[49]).toBe("50")
		}
	})

	it("treats a single buffer as a batch of one", () => {
		expect(decodeBatch(wkbPoint(1, 3), { ids: ["only"] })).toEqual({
			shape: "points",
			coordinates: [[1, 3]],
			ids: ["only"],
			crs: null,
		})
	})

	it("reports progress when a callback is given", () => {
		const onProgress = vi.fn<(event: ProgressEvent) => void>()
		decodeBatch([wkbPoint(1, 3), wkbPoint(2, 2)], {}, onProgress)
		const messages = onProgress.mock.calls.map(([event]) =>
			progressEventMessage(event),
		)
		expect(messages).toEqual([
			"Decoding 2 WKB geometries...",
			"Decoded 2 Point geometries",
		])
	})
})

describe("decodeBatch errors", () => {
	it("rejects an empty batch", () => {
		expect(() => decodeBatch([])).toThrow(InvalidInputError)
		expect(() => decodeBatch([])).toThrow("wkb must have length 1 or greater")
	})

	it("rejects mismatched ids", () => {
		expect(() =>
			decodeBatch([wkbPoint(1, 3), wkbPoint(2, 2)], { ids: ["a"] }),
		).toThrow("wkb and ids must have the same length, got 2 buffers and 1 ids")
		expect(() => decodeBatch(wkbPoint(1, 3), { ids: ["a", "b"] })).toThrow(
			InvalidInputError,
		)
	})

	it("rejects duplicate ids", () => {
		expect(() =>
			decodeBatch([wkbPoint(1, 3), wkbPoint(2, 2)], { ids: ["a", "a"] }),
		).toThrow('ids must be unique, "a" is repeated')
	})

	it("validates inputs before decoding anything", () => {
		const bigEndian = wkbPoint(1, 3)
		bigEndian[0] = 0
		const input: unknown[] = [bigEndian, "0101000000"]
		// @ts-expect-error testing a non-byte element
		expect(() => decodeBatch(input)).toThrow(
			"Each element of wkb must be a Uint8Array, element 1 is string",
		)
	})

	it("rejects input that is not a list of buffers", () => {
		const input: unknown = { length: 1 }
		// @ts-expect-error testing a non-array input
		expect(() => decodeBatch(input)).toThrow(InvalidInputError)
	})

	it("rejects mixed geometry types and names the first odd element", () => {
		const buffers = [
			wkbPoint(1, 3),
			wkbLineString([
				[1, 1],
				[2, 2],
			]),
		]
		expect(() => decodeBatch(buffers)).toThrow(MixedGeometryTypeError)
		try {
			decodeBatch(buffers)
			expect.unreachable()
		} catch (error) {
			expect(error).toBeInstanceOf(MixedGeometryTypeError)
			if (error instanceof MixedGeometryTypeError) {
				expect(error.message).toBe(
					'Elements of a batch cannot have different geometry types, found Point, LineString (element 1, id "2")',
				)
				expect(error.details).toEqual({
					types: ["Point", "LineString"],
					index: 1,
					id: "2",
				})
			}
		}
	})

	it("decodes every element before checking geometry types", () => {
		const buffers = [
			wkbPoint(1, 1),
			wkbLineString([[0, 0]]),
			wkbPoint(1, 1).subarray(0, 9),
		]
		try {
			decodeBatch(buffers)
			expect.unreachable()
		} catch (error) {
			expect(error).toBeInstanceOf(TruncatedInputError)
			expect(error).not.toBeInstanceOf(MixedGeometryTypeError)
			if (error instanceof TruncatedInputError) {
				expect(error.message).toBe(
					'Unexpected end of WKB: needed 8 bytes at offset 5, 4 available (element 2, id "3")',
				)
				expect(error.details.index).toBe(2)
				expect(error.details.id).toBe("3")
			}
		}
	})

	it("does not merge Point and MultiPoint", () => {
		expect(() => decodeBatch([wkbPoint(1, 3), wkbMultiPoint([[1, 3]])])).toThrow(
			MixedGeometryTypeError,
		)
	})

	it("annotates decode errors with the failing element", () => {
		const truncated = wkbPoint(2, 2).subarray(0, 9)
		try {
			decodeBatch([wkbPoint(1, 3), truncated], { ids: ["a", "b"] })
			expect.unreachable()
		} catch (error) {
			expect(error).toBeInstanceOf(TruncatedInputError)
			if (error instanceof TruncatedInputError) {
				expect(error.message).toBe(
					'Unexpected end of WKB: needed 8 bytes at offset 5, 4 available (element 1, id "b")',
				)
				expect(error.details.index).toBe(1)
				expect(error.details.id).toBe("b")
			}
		}
	})

	it("fails the whole batch on a bad byte order", () => {
		const bigEndian = wkbPoint(2, 2)
		bigEndian[0] = 0
		const onProgress = vi.fn<(event: ProgressEvent) => void>()
		expect(() =>
			decodeBatch([wkbPoint(1, 3), bigEndian], {}, onProgress),
		).toThrow(UnsupportedByteOrderError)
		expect(onProgress).toHaveBeenCalledTimes(1)
	})
})
