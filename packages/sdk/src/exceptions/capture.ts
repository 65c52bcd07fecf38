import {
	type Attributes,
	type HrTime,
	type Span,
	SpanStatusCode,
} from '@opentelemetry/api';
import {
	ATTR_EXCEPTION_MESSAGE,
	ATTR_EXCEPTION_STACKTRACE,
	ATTR_EXCEPTION_TYPE,
} from '@opentelemetry/semantic-conventions';
import type { Logger } from '@spanwire/logger';
import { ZodError as ZodErrorV3 } from 'zod';
import { ZodError } from 'zod/v4';
import { ATTR_EXCEPTION_DATA, ATTR_EXCEPTION_TRACE } from '../constants';
import { CaptureError } from '../errors';
import { type StackFrame, parseStack } from './stack';

export interface TraceFrame {
	filename: string;
	lineno: number;
	name: string;
	line: string;
	locals: null;
}

export interface ExceptionStack {
	exc_type: string;
	exc_value: string;
	syntax_error: { message: string } | null;
	is_cause: boolean;
	frames: TraceFrame[];
}

export interface ExceptionTrace {
	stacks: ExceptionStack[];
}

export interface ValidationIssue {
	type: string;
	loc: (string | number)[];
	msg: string;
	input: unknown;
}

export const EXCEPTION_EVENT = 'exception';

const UNKNOWN = '<unknown>';

/**
 * A zod error from either API the package ships (`zod` or `zod/v4`).
 */
export type ValidationError = ZodError | ZodErrorV3;

type ValidationErrorIssue =
	| ZodError['issues'][number]
	| ZodErrorV3['issues'][number];

export function isValidationError(error: unknown): error is ValidationError {
	return error instanceof ZodError || error instanceof ZodErrorV3;
}

function describeType(error: unknown): string {
	if (error instanceof Error) {
		if (error.name === 'Error' && error.constructor.name !== 'Error') {
			return error.constructor.name;
		}
		return error.name;
	}
	if (error === null) return 'null';
	if (typeof error === 'object') return error.constructor?.name ?? 'Object';
	return typeof error;
}

/**
 * Type name reported for a thrown value. Subclasses that keep the default
 * `Error` name report their constructor instead. Values that cannot be
 * inspected (revoked proxies, throwing getters) report `<unknown>`.
 */
export function exceptionType(error: unknown): string {
	try {
		return describeType(error);
	} catch {
		return UNKNOWN;
	}
}

export function exceptionMessage(error: unknown): string {
	try {
		return error instanceof Error ? error.message : String(error);
	} catch {
		return UNKNOWN;
	}
}

/**
 * Errors along the `cause` chain, outermost first. Each object appears
 * once; a cycle ends the walk.
 */
export function causeChain(error: unknown): unknown[] {
	const chain: unknown[] = [];
	const visited = new Set<unknown>();
	let current: unknown = error;

	while (current !== undefined && current !== null && !visited.has(current)) {
		chain.push(current);
		visited.add(current);
		current = current instanceof Error ? current.cause : undefined;
	}

	return chain;
}

function sameFrame(a: StackFrame, b: StackFrame): boolean {
	return (
		a.file === b.file && a.line === b.line && a.function === b.function
	);
}

function toTraceFrame(frame: StackFrame): TraceFrame {
	return {
		filename: frame.file,
		lineno: frame.line,
		name: frame.function,
		line: '',
		locals: null,
	};
}

/**
 * Builds the structured trace. Frames are ordered outermost call first,
 * and a cause drops its leading frames that also appear in the error
 * wrapping it. Membership rather than position is compared since both
 * stacks may be cut at `Error.stackTraceLimit`.
 */
export function buildExceptionTrace(error: unknown): ExceptionTrace {
	const stacks: ExceptionStack[] = [];
	let enclosing: StackFrame[] = [];

	causeChain(error).forEach((item, index) => {
		const frames =
			item instanceof Error ? parseStack(item.stack ?? '').reverse() : [];

		let shared = 0;
		while (
			index > 0 &&
			shared < frames.length &&
			enclosing.some((outer) => sameFrame(outer, frames[shared]))
		) {
			shared++;
		}

		stacks.push({
			exc_type: exceptionType(item),
			exc_value: exceptionMessage(item),
			syntax_error:
				item instanceof SyntaxError ? { message: item.message } : null,
			is_cause: index > 0,
			frames: frames.slice(shared).map(toTraceFrame),
		});
		enclosing = frames;
	});

	return { stacks };
}

/**
 * Issues of a zod validation error in the wire shape.
 */
export function validationIssues(error: ValidationError): ValidationIssue[] {
	const issues: readonly ValidationErrorIssue[] = error.issues;

	return issues.map((issue) => {
		const path: readonly PropertyKey[] = issue.path;
		return {
			type: issue.code,
			loc: path.map((segment) =>
				typeof segment === 'symbol' ? segment.toString() : segment,
			),
			msg: issue.message,
			input: ('input' in issue ? issue.input : undefined) ?? null,
		};
	});
}

function stackTrace(chain: unknown[]): string {
	return chain
		.map((item) =>
			item instanceof Error && item.stack
				? item.stack
				: `${exceptionType(item)}: ${exceptionMessage(item)}`,
		)
		.join('\nCaused by: ');
}

/**
 * Attributes of the `exception` event for a thrown value.
 */
export function exceptionAttributes(error: unknown): Attributes {
	const attributes: Attributes = {
		[ATTR_EXCEPTION_TYPE]: exceptionType(error),
		[ATTR_EXCEPTION_MESSAGE]: exceptionMessage(error),
		[ATTR_EXCEPTION_STACKTRACE]: stackTrace(causeChain(error)),
	};

	if (isValidationError(error)) {
		attributes[ATTR_EXCEPTION_DATA] = JSON.stringify(
			validationIssues(error),
		);
	}
	attributes[ATTR_EXCEPTION_TRACE] = JSON.stringify(
		buildExceptionTrace(error),
	);

	return attributes;
}

function fallbackAttributes(error: unknown): Attributes {
	const trace: ExceptionTrace = { stacks: [] };

	return {
		[ATTR_EXCEPTION_TYPE]: exceptionType(error),
		[ATTR_EXCEPTION_MESSAGE]: exceptionMessage(error),
		[ATTR_EXCEPTION_TRACE]: JSON.stringify(trace),
	};
}

/**
 * Records `error` as an `exception` event on `span` and marks the span
 * failed. Never throws: if building the trace fails the event carries
 * the type and message only and the failure is logged.
 *
 * @example
 * ```typescript
 * try {
 *   await charge(order);
 * } catch (error) {
 *   captureException(span, error, endTime, logger);
 *   throw error;
 * }
 * ```
 */
export function captureException(
	span: Span,
	error: unknown,
	time: HrTime,
	logger: Logger,
): void {
	let attributes: Attributes;
	try {
		attributes = exceptionAttributes(error);
	} catch (cause) {
		const failure = new CaptureError('Failed to capture exception details', {
			cause,
		});
		logger.error(
			{ error: failure.message, cause: exceptionMessage(cause) },
			'Exception capture degraded',
		);
		attributes = fallbackAttributes(error);
	}

	span.addEvent(EXCEPTION_EVENT, attributes, time);
	span.setStatus({
		code: SpanStatusCode.ERROR,
		message: String(attributes[ATTR_EXCEPTION_MESSAGE]),
	});
}
