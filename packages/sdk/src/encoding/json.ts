import { DATATYPE_KEY } from '../constants';
import { EncodingError } from '../errors';

export type JsonValue =
	| string
	| number
	| boolean
	| null
	| JsonValue[]
	| { [key: string]: JsonValue };

export type Datatype =
	| 'array'
	| 'set'
	| 'object'
	| 'map'
	| 'record'
	| 'date'
	| 'error'
	| 'bigint'
	| 'bytes'
	| 'unknown';

/**
 * Closed set of value shapes the encoder distinguishes.
 */
export type Classification =
	| { variant: 'primitive' }
	| { variant: 'sequence'; datatype: 'array' | 'set' }
	| { variant: 'mapping'; datatype: 'object' | 'map' }
	| { variant: 'record'; datatype: 'record' | 'date' | 'error'; cls: string }
	| { variant: 'opaque'; datatype: 'bigint' | 'bytes' | 'unknown' };

export interface TaggedValue {
	[DATATYPE_KEY]: Datatype;
	data: JsonValue;
	cls?: string;
}

const CIRCULAR = '[Circular]';

function className(value: object): string {
	const name = value.constructor?.name;
	return typeof name === 'string' && name ? name : 'Object';
}

function isPlainObject(value: object): boolean {
	const proto = Object.getPrototypeOf(value);
	return proto === null || proto === Object.prototype;
}

/**
 * Decides which variant a value belongs to.
 */
export function classify(value: unknown): Classification {
	if (
		value === null ||
		value === undefined ||
		typeof value === 'string' ||
		typeof value === 'number' ||
		typeof value === 'boolean'
	) {
		return { variant: 'primitive' };
	}
	if (typeof value === 'bigint') {
		return { variant: 'opaque', datatype: 'bigint' };
	}
	if (typeof value !== 'object') {
		return { variant: 'opaque', datatype: 'unknown' };
	}
	if (Array.isArray(value)) {
		return { variant: 'sequence', datatype: 'array' };
	}
	if (value instanceof Set) {
		return { variant: 'sequence', datatype: 'set' };
	}
	if (value instanceof Map) {
		return { variant: 'mapping', datatype: 'map' };
	}
	if (value instanceof Uint8Array || value instanceof ArrayBuffer) {
		return { variant: 'opaque', datatype: 'bytes' };
	}
	if (value instanceof Date) {
		return { variant: 'record', datatype: 'date', cls: 'Date' };
	}
	if (value instanceof Error) {
		return { variant: 'record', datatype: 'error', cls: className(value) };
	}
	if (isPlainObject(value)) {
		return { variant: 'mapping', datatype: 'object' };
	}

	return { variant: 'record', datatype: 'record', cls: className(value) };
}

class JsonEncoder {
	// objects on the current path, not every object seen
	private readonly ancestors = new Set<object>();

	encodeTagged(value: unknown): TaggedValue {
		const kind = classify(value);
		if (kind.variant === 'primitive') {
			throw new EncodingError('Primitive values are not tagged');
		}

		if (typeof value === 'object' && value !== null) {
			if (this.ancestors.has(value)) {
				return { [DATATYPE_KEY]: 'unknown', data: CIRCULAR };
			}
			this.ancestors.add(value);
			try {
				return this.tag(kind, this.data(kind, value));
			} finally {
				this.ancestors.delete(value);
			}
		}

		return this.tag(kind, this.data(kind, value));
	}

	private tag(kind: Classification, data: JsonValue): TaggedValue {
		if (kind.variant === 'primitive') {
			throw new EncodingError('Primitive values are not tagged');
		}
		if (kind.variant === 'record') {
			return { [DATATYPE_KEY]: kind.datatype, data, cls: kind.cls };
		}
		return { [DATATYPE_KEY]: kind.datatype, data };
	}

	private data(kind: Classification, value: unknown): JsonValue {
		if (kind.variant === 'primitive') {
			return this.nested(value);
		}

		switch (kind.datatype) {
			case 'array':
				return Array.isArray(value) ? this.items(value) : null;
			case 'set':
				return value instanceof Set ? this.items([...value]) : null;
			case 'map':
				return value instanceof Map
					? this.entries(
							[...value.entries()].map(([key, item]) => [String(key), item]),
						)
					: null;
			case 'object':
			case 'record':
				return typeof value === 'object' && value !== null
					? this.objectData(value)
					: null;
			case 'date':
				return value instanceof Date && !Number.isNaN(value.getTime())
					? value.toISOString()
					: String(value);
			case 'error':
				return value instanceof Error
					? this.entries([
							['message', value.message],
							...Object.entries(value),
						])
					: null;
			case 'bigint':
				return String(value);
			case 'bytes':
				return value instanceof ArrayBuffer
					? Buffer.from(value).toString('base64')
					: value instanceof Uint8Array
						? Buffer.from(value).toString('base64')
						: null;
			case 'unknown':
				return typeof value === 'function'
					? `[Function ${value.name || 'anonymous'}]`
					: String(value);
		}
	}

	private objectData(value: object): JsonValue {
		if ('toJSON' in value && typeof value.toJSON === 'function') {
			const json: unknown = value.toJSON();
			return this.nested(json);
		}
		return this.entries(Object.entries(value));
	}

	private items(values: unknown[]): JsonValue[] {
		return values.map((item) =>
			item === undefined ? null : this.nested(item),
		);
	}

	private entries(pairs: [string, unknown][]): { [key: string]: JsonValue } {
		const result: { [key: string]: JsonValue } = {};
		for (const [key, item] of pairs) {
			if (item === undefined) continue;
			result[key] = this.nested(item);
		}
		return result;
	}

	/**
	 * Nested primitives and plain containers stay plain JSON, everything
	 * else is tagged.
	 */
	private nested(value: unknown): JsonValue {
		if (value === null || value === undefined) {
			return null;
		}
		if (typeof value === 'string' || typeof value === 'boolean') {
			return value;
		}
		if (typeof value === 'number') {
			return Number.isFinite(value) ? value : String(value);
		}

		const kind = classify(value);
		if (
			typeof value === 'object' &&
			(kind.variant === 'sequence' || kind.variant === 'mapping') &&
			(kind.datatype === 'array' || kind.datatype === 'object')
		) {
			if (this.ancestors.has(value)) {
				return { [DATATYPE_KEY]: 'unknown', data: CIRCULAR };
			}
			this.ancestors.add(value);
			try {
				return this.data(kind, value);
			} finally {
				this.ancestors.delete(value);
			}
		}

		const tagged = this.encodeTagged(value);
		return tagged.cls === undefined
			? { [DATATYPE_KEY]: tagged[DATATYPE_KEY], data: tagged.data }
			: {
					[DATATYPE_KEY]: tagged[DATATYPE_KEY],
					data: tagged.data,
					cls: tagged.cls,
				};
	}
}

/**
 * Encodes a non-primitive value as the JSON text stored under
 * `<name>__JSON`.
 *
 * @example
 * ```typescript
 * class Point { constructor(public x: number, public y: number) {} }
 * encodeJson(new Point(1, 2));
 * // '{"$__datatype__":"record","data":{"x":1,"y":2},"cls":"Point"}'
 * ```
 *
 * @throws {EncodingError} when the value cannot be read
 */
export function encodeJson(value: unknown): string {
	try {
		return JSON.stringify(new JsonEncoder().encodeTagged(value));
	} catch (error) {
		if (error instanceof EncodingError) {
			throw error;
		}
		throw new EncodingError(
			`Failed to encode value of type ${describeType(value)}`,
			{ cause: error },
		);
	}
}

/**
 * Attribute text used when {@link encodeJson} fails.
 */
export function unencodablePlaceholder(value: unknown): string {
	const tagged: TaggedValue = {
		[DATATYPE_KEY]: 'unknown',
		data: `<unencodable ${describeType(value)}>`,
	};
	return JSON.stringify(tagged);
}

function describeType(value: unknown): string {
	if (typeof value === 'object' && value !== null) {
		return className(value);
	}
	return typeof value;
}
