import { concatBytes } from "@wkbread/shared/concat-bytes"
import {
	float64LE,
	uint32LE,
	WKB_POINT,
	wkbHeader,
} from "@wkbread/test-utils/wkb"
import { describe, expect, it } from "vitest"
import { ByteCursor } from "../src/byte-cursor"
import {
	UnknownGeometryTypeError,
	UnsupportedByteOrderError,
	UnsupportedGeometryTypeError,
} from "../src/errors"
import {
	classifyTypeCode,
	readByteOrderFlag,
	readCoordinate,
	readCount,
	readHeader,
	readTypeCode,
} from "../src/readers"

describe("primitive readers", () => {
	it("reads the byte order flag", () => {
		expect(readByteOrderFlag(new ByteCursor(new Uint8Array([1])))).toBe(
			"LittleEndian",
		)
		expect(readByteOrderFlag(new ByteCursor(new Uint8Array([0])))).toBe(
			"Other",
		)
		expect(readByteOrderFlag(new ByteCursor(new Uint8Array([2])))).toBe(
			"Other",
		)
	})

	it("reads type codes, counts and coordinates", () => {
		const cursor = new ByteCursor(
			concatBytes([uint32LE(6), uint32LE(3), float64LE(1.5), float64LE(-2)]),
		)
		expect(readTypeCode(cursor)).toBe(6)
		expect(readCount(cursor)).toBe(3)
		expect(readCoordinate(cursor)).toEqual([1.5, -2])
		expect(cursor.remaining).toBe(0)
	})

	it("classifies type codes", () => {
		expect(classifyTypeCode(1)).toEqual({ kind: "supported", type: "Point" })
		expect(classifyTypeCode(6)).toEqual({
			kind: "supported",
			type: "MultiPolygon",
		})
		expect(classifyTypeCode(7)).toEqual({
			kind: "unsupported",
			name: "GeometryCollection",
		})
		expect(classifyTypeCode(0)).toEqual({ kind: "unknown", code: 0 })
		expect(classifyTypeCode(8)).toEqual({ kind: "unknown", code: 8 })
	})
})

describe("readHeader", () => {
	it("reads a little endian header", () => {
		const cursor = new ByteCursor(wkbHeader(WKB_POINT))
		expect(readHeader(cursor)).toEqual({ offset: 0, typeCode: 1, type: "Point" })
		expect(cursor.position).toBe(5)
	})

	it("rejects big endian headers", () => {
		expect(() => readHeader(new ByteCursor(wkbHeader(WKB_POINT, 0)))).toThrow(
			UnsupportedByteOrderError,
		)
	})

	it("rejects GeometryCollection as unsupported", () => {
		expect(() => readHeader(new ByteCursor(wkbHeader(7)))).toThrow(
			UnsupportedGeometryTypeError,
		)
	})

	it("names Z/M and EWKB variants in unknown type errors", () => {
		expect(() => readHeader(new ByteCursor(wkbHeader(1001)))).toThrow(
			"Unknown WKB geometry type code 1001: Z and M dimensions are not supported",
		)
		expect(() => readHeader(new ByteCursor(wkbHeader(0x20000001)))).toThrow(
			"Unknown WKB geometry type code 0x20000001: EWKB Z, M and SRID flags are not supported",
		)
		expect(() => readHeader(new ByteCursor(wkbHeader(0x20000001)))).toThrow(
			UnknownGeometryTypeError,
		)
	})
})
