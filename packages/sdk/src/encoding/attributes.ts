import type { Attributes, AttributeValue } from '@opentelemetry/api';
import type { Logger } from '@spanwire/logger';
import {
	ATTR_CODE_FILEPATH,
	ATTR_CODE_FUNCTION,
	ATTR_CODE_LINENO,
	ATTR_MSG,
	ATTR_MSG_TEMPLATE,
	ATTR_NULL_ARGS,
	ATTR_TAGS,
	JSON_ATTRIBUTE_SUFFIX,
	RESERVED_ATTRIBUTE_PREFIXES,
} from '../constants';
import { EncodingError } from '../errors';
import { encodeJson, unencodablePlaceholder } from './json';
import { renderTemplate } from './template';

export interface CallSite {
	filepath: string;
	lineno: number;
	function: string;
}

export interface EncodeOptions {
	callSite?: CallSite;
	/** Receives warnings for values that fall back to a placeholder */
	logger?: Logger;
}

export interface EncodedRecord {
	message: string;
	attributes: Attributes;
}

export type EncodedValue =
	| { kind: 'attribute'; key: string; value: AttributeValue }
	| { kind: 'null' };

export function isReservedKey(key: string): boolean {
	return RESERVED_ATTRIBUTE_PREFIXES.some((prefix) => key.startsWith(prefix));
}

/**
 * Converts one named value to its attribute form. Primitives are stored
 * as-is, `null`/`undefined` are reported as null arguments, and
 * everything else becomes JSON under `<name>__JSON`.
 */
export function encodeValue(
	name: string,
	value: unknown,
	logger?: Logger,
): EncodedValue {
	if (value === null || value === undefined) {
		return { kind: 'null' };
	}
	if (
		typeof value === 'string' ||
		typeof value === 'number' ||
		typeof value === 'boolean'
	) {
		return { kind: 'attribute', key: name, value };
	}

	const key = `${name}${JSON_ATTRIBUTE_SUFFIX}`;
	try {
		return { kind: 'attribute', key, value: encodeJson(value) };
	} catch (error) {
		if (!(error instanceof EncodingError)) {
			throw error;
		}
		logger?.warn(
			{ attribute: name, error: error.message },
			'Attribute could not be encoded, storing placeholder',
		);
		return { kind: 'attribute', key, value: unencodablePlaceholder(value) };
	}
}

/**
 * Renders the message and builds the ordered attribute map shared by
 * every record kind.
 *
 * @example
 * ```typescript
 * const { message, attributes } = encode(
 *   'test {name=} {number}',
 *   undefined,
 *   ['checkout'],
 *   { name: 'foo', number: 3 },
 * );
 * // message === 'test name=foo 3'
 * // attributes: { name: 'foo', number: 3, 'logfire.tags': ['checkout'],
 * //   'logfire.msg_template': 'test {name=} {number}',
 * //   'logfire.msg': 'test name=foo 3' }
 * ```
 *
 * @throws {TemplateArgumentError} when the template references a missing value
 */
export function encode(
	template: string,
	spanName: string | undefined,
	tags: readonly string[],
	values: Readonly<Record<string, unknown>>,
	options: EncodeOptions = {},
): EncodedRecord {
	const message = renderTemplate(template, values, { spanName });
	const attributes: Attributes = {};

	if (options.callSite) {
		attributes[ATTR_CODE_FILEPATH] = options.callSite.filepath;
		attributes[ATTR_CODE_LINENO] = options.callSite.lineno;
		attributes[ATTR_CODE_FUNCTION] = options.callSite.function;
	}

	const nullArgs: string[] = [];
	for (const [name, value] of Object.entries(values)) {
		if (isReservedKey(name)) continue;

		const encoded = encodeValue(name, value, options.logger);
		if (encoded.kind === 'null') {
			nullArgs.push(name);
		} else {
			attributes[encoded.key] = encoded.value;
		}
	}

	if (nullArgs.length > 0) {
		attributes[ATTR_NULL_ARGS] = nullArgs;
	}
	if (tags.length > 0) {
		attributes[ATTR_TAGS] = [...tags];
	}
	attributes[ATTR_MSG_TEMPLATE] = template;
	attributes[ATTR_MSG] = message;

	return { message, attributes };
}
