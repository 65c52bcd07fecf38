import { describe, expect, it } from 'vitest';
import { createMockLogger } from '../../__tests__/helpers';
import { TemplateArgumentError } from '../../errors';
import { encode, encodeValue, isReservedKey } from '../attributes';

const callSite = {
	filepath: 'src/checkout.ts',
	lineno: 42,
	function: 'checkout',
};

describe('encode', () => {
	it('should render the message and store values', () => {
		const { message, attributes } = encode(
			'test {name=} {number}',
			undefined,
			[],
			{ name: 'foo', number: 3, extra: 'extra' },
		);

		expect(message).toBe('test name=foo 3');
		expect(attributes).toEqual({
			name: 'foo',
			number: 3,
			extra: 'extra',
			'logfire.msg_template': 'test {name=} {number}',
			'logfire.msg': 'test name=foo 3',
		});
	});

	it('should list null values as null args', () => {
		const { message, attributes } = encode(
			'test {name} {number} {none}',
			undefined,
			[],
			{ name: 'foo', number: 2, none: null },
		);

		expect(message).toBe('test foo 2 null');
		expect(attributes['logfire.null_args']).toEqual(['none']);
		expect(attributes).not.toHaveProperty(['none']);
	});

	it('should place reserved attributes in fixed positions', () => {
		const { attributes } = encode(
			'{b} {a}',
			undefined,
			['checkout', 'eu'],
			{ b: 1, a: undefined },
			{ callSite },
		);

		expect(Object.keys(attributes)).toEqual([
			'code.filepath',
			'code.lineno',
			'code.function',
			'b',
			'logfire.null_args',
			'logfire.tags',
			'logfire.msg_template',
			'logfire.msg',
		]);
		expect(attributes['code.lineno']).toBe(42);
		expect(attributes['logfire.tags']).toEqual(['checkout', 'eu']);
	});

	it('should omit tags when there are none', () => {
		const { attributes } = encode('plain', undefined, [], {});

		expect(attributes).not.toHaveProperty(['logfire.tags']);
	});

	it('should store non-primitive values as tagged JSON', () => {
		const { message, attributes } = encode('{items}', undefined, [], {
			items: [1, 2],
		});

		expect(message).toBe('[ 1, 2 ]');
		expect(attributes).not.toHaveProperty(['items']);
		expect(attributes['items__JSON']).toBe(
			'{"$__datatype__":"array","data":[1,2]}',
		);
	});

	it('should render reserved keys without storing them', () => {
		const { message, attributes } = encode(
			'{logfire.custom}',
			undefined,
			[],
			{ 'logfire.custom': 'shown', 'code.filepath': 'ignored.ts' },
		);

		expect(message).toBe('shown');
		expect(attributes).toEqual({
			'logfire.msg_template': '{logfire.custom}',
			'logfire.msg': 'shown',
		});
	});

	it('should fill span_name from the explicit span name', () => {
		const { message, attributes } = encode(
			'handling {span_name}',
			'GET /',
			[],
			{},
		);

		expect(message).toBe('handling GET /');
		expect(attributes).not.toHaveProperty(['span_name']);
	});

	it('should throw before encoding when an argument is missing', () => {
		expect(() => encode('{missing}', undefined, [], {})).toThrow(
			TemplateArgumentError,
		);
	});

	it('should produce identical output for identical input', () => {
		const values = { a: { nested: true }, b: 'x' };

		expect(encode('{b}', undefined, ['t'], values)).toEqual(
			encode('{b}', undefined, ['t'], values),
		);
	});

	it('should fall back to a placeholder for unreadable values', () => {
		const logger = createMockLogger();
		const hostile = {
			get boom(): never {
				throw new Error('nope');
			},
		};

		const { attributes } = encode('x', undefined, [], { hostile }, { logger });

		expect(attributes['hostile__JSON']).toBe(
			'{"$__datatype__":"unknown","data":"<unencodable Object>"}',
		);
		expect(logger.warn).toHaveBeenCalledWith(
			{
				attribute: 'hostile',
				error: 'Failed to encode value of type Object',
			},
			'Attribute could not be encoded, storing placeholder',
		);
	});
});

describe('encodeValue', () => {
	it('should keep primitives under their own name', () => {
		expect(encodeValue('count', 3)).toEqual({
			kind: 'attribute',
			key: 'count',
			value: 3,
		});
	});

	it('should report null values', () => {
		expect(encodeValue('missing', undefined)).toEqual({ kind: 'null' });
	});
});

describe('isReservedKey', () => {
	it('should match the code and logfire namespaces', () => {
		expect(isReservedKey('code.lineno')).toBe(true);
		expect(isReservedKey('logfire.tags')).toBe(true);
		expect(isReservedKey('codex')).toBe(false);
	});
});
