import { inspect } from 'node:util';
import { TemplateArgumentError } from '../errors';

export type TemplatePart =
	| { kind: 'literal'; text: string }
	| { kind: 'field'; name: string; showName: boolean };

/**
 * Placeholder that falls back to the explicit span name when no value
 * of that name is bound.
 */
export const SPAN_NAME_FIELD = 'span_name';

/**
 * Splits a message template into literal text and placeholders.
 *
 * Supports `{name}`, `{name=}` (renders `name=<value>`) and `{{` / `}}`
 * escapes for literal braces.
 *
 * @example
 * ```typescript
 * parseTemplate('hello {who=}!');
 * // [{ kind: 'literal', text: 'hello ' },
 * //  { kind: 'field', name: 'who', showName: true },
 * //  { kind: 'literal', text: '!' }]
 * ```
 */
export function parseTemplate(template: string): TemplatePart[] {
	const parts: TemplatePart[] = [];
	let literal = '';
	let index = 0;

	while (index < template.length) {
		const char = template[index];
		const next = template[index + 1];

		if ((char === '{' && next === '{') || (char === '}' && next === '}')) {
			literal += char;
			index += 2;
			continue;
		}

		if (char !== '{') {
			literal += char;
			index += 1;
			continue;
		}

		const close = template.indexOf('}', index + 1);
		if (close === -1) {
			throw new TemplateArgumentError(
				`Unterminated placeholder at position ${index} in template "${template}"`,
				template,
			);
		}

		let name = template.slice(index + 1, close).trim();
		const showName = name.endsWith('=');
		if (showName) {
			name = name.slice(0, -1).trim();
		}
		if (!name) {
			throw new TemplateArgumentError(
				`Empty placeholder at position ${index} in template "${template}"`,
				template,
			);
		}

		if (literal) {
			parts.push({ kind: 'literal', text: literal });
			literal = '';
		}
		parts.push({ kind: 'field', name, showName });
		index = close + 1;
	}

	if (literal) {
		parts.push({ kind: 'literal', text: literal });
	}

	return parts;
}

/**
 * Display form of a value inside a rendered message.
 */
export function formatValue(value: unknown): string {
	if (value === null || value === undefined) {
		return 'null';
	}
	if (typeof value === 'string') {
		return value;
	}
	if (
		typeof value === 'number' ||
		typeof value === 'boolean' ||
		typeof value === 'bigint'
	) {
		return String(value);
	}
	if (value instanceof Error) {
		return `${value.name}: ${value.message}`;
	}

	return inspect(value, { breakLength: Number.POSITIVE_INFINITY, depth: 4 });
}

export interface RenderOptions {
	spanName?: string;
}

/**
 * Renders a template against named values.
 *
 * @throws {TemplateArgumentError} when a placeholder has no value
 */
export function renderTemplate(
	template: string,
	values: Readonly<Record<string, unknown>>,
	options: RenderOptions = {},
): string {
	let message = '';

	for (const part of parseTemplate(template)) {
		if (part.kind === 'literal') {
			message += part.text;
			continue;
		}

		let value: unknown;
		if (Object.hasOwn(values, part.name)) {
			value = values[part.name];
		} else if (
			part.name === SPAN_NAME_FIELD &&
			options.spanName !== undefined
		) {
			value = options.spanName;
		} else {
			throw new TemplateArgumentError(
				`Missing value for template argument "${part.name}" in "${template}"`,
				template,
				part.name,
			);
		}

		const display = formatValue(value);
		message += part.showName ? `${part.name}=${display}` : display;
	}

	return message;
}
