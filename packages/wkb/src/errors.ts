/**
 * Error taxonomy for WKB decoding.
 *
 * Every failure aborts the whole decode. Errors raised while decoding one
 * element of a batch are annotated with that element's index and id via
 * {@link WkbError.withElement} before they reach the caller.
 *
 * @module
 */

/**
 * Extra context attached to a {@link WkbError}.
 */
export interface WkbErrorDetails extends Record<string, unknown> {
	/** Position of the failing element in the batch. */
	index?: number
	/** Identifier of the failing element in the batch. */
	id?: string
	/** Byte offset in the buffer where the failing read started. */
	offset?: number
}

export type WkbErrorCode =
	| "INVALID_INPUT"
	| "UNSUPPORTED_BYTE_ORDER"
	| "UNSUPPORTED_GEOMETRY_TYPE"
	| "UNKNOWN_GEOMETRY_TYPE"
	| "NESTED_TYPE_MISMATCH"
	| "TRUNCATED_INPUT"
	| "MIXED_GEOMETRY_TYPE"

/**
 * Base class of every error thrown by the decoder.
 */
export class WkbError extends Error {
	constructor(
		message: string,
		public code: WkbErrorCode,
		public details: WkbErrorDetails = {},
	) {
		super(message)
		this.name = "WkbError"
	}

	/**
	 * Record which batch element failed and return this error for rethrowing.
	 */
	withElement(index: number, id: string): this {
		this.details.index = index
		this.details.id = id
		this.message = `${this.message} (element ${index}, id "${id}")`
		return this
	}
}

/** The batch arguments are malformed. Thrown before any decoding. */
export class InvalidInputError extends WkbError {
	constructor(message: string, details?: WkbErrorDetails) {
		super(message, "INVALID_INPUT", details)
		this.name = "InvalidInputError"
	}
}

/** A header declared a byte order other than little endian. */
export class UnsupportedByteOrderError extends WkbError {
	constructor(offset: number) {
		super(
			`Only little endian WKB is supported, header at offset ${offset} declares another byte order`,
			"UNSUPPORTED_BYTE_ORDER",
			{ offset },
		)
		this.name = "UnsupportedByteOrderError"
	}
}

/** A recognized OGC geometry type that the decoder does not handle. */
export class UnsupportedGeometryTypeError extends WkbError {
	constructor(typeName: string, offset: number) {
		super(
			`${typeName} is not a supported geometry type`,
			"UNSUPPORTED_GEOMETRY_TYPE",
			{ offset, typeName },
		)
		this.name = "UnsupportedGeometryTypeError"
	}
}

/** A type code outside the OGC 2D codes 1 through 7. */
export class UnknownGeometryTypeError extends WkbError {
	constructor(message: string, code: number, offset: number) {
		super(message, "UNKNOWN_GEOMETRY_TYPE", { offset, typeCode: code })
		this.name = "UnknownGeometryTypeError"
	}
}

/** A member of a multi-geometry has the wrong simple type. */
export class NestedTypeMismatchError extends WkbError {
	constructor(container: string, expected: string, actual: string, offset: number) {
		super(
			`${container}s may contain only ${expected}s, found ${actual}`,
			"NESTED_TYPE_MISMATCH",
			{ offset, expected, actual },
		)
		this.name = "NestedTypeMismatchError"
	}
}

/** A read asked for more bytes than remain in the buffer. */
export class TruncatedInputError extends WkbError {
	constructor(offset: number, requested: number, available: number) {
		super(
			`Unexpected end of WKB: needed ${requested} bytes at offset ${offset}, ${available} available`,
			"TRUNCATED_INPUT",
			{ offset, requested, available },
		)
		this.name = "TruncatedInputError"
	}
}

/** The geometries of one batch do not share a single type. */
export class MixedGeometryTypeError extends WkbError {
	constructor(types: string[], index: number) {
		super(
			`Elements of a batch cannot have different geometry types, found ${types.join(", ")}`,
			"MIXED_GEOMETRY_TYPE",
			{ types, index },
		)
		this.name = "MixedGeometryTypeError"
	}
}
