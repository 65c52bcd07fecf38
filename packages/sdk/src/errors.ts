/**
 * Base class for every error raised by the SDK.
 */
export class SpanwireError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = this.constructor.name;
		Error.captureStackTrace(this, this.constructor);
	}
}

/**
 * Invalid settings. Raised while the configuration initializes.
 */
export class ConfigurationError extends SpanwireError {
	constructor(
		message: string,
		/** Dotted paths of the offending settings */
		readonly fields: string[] = [],
	) {
		super(message);
	}
}

/**
 * A message template references a value that was not supplied, or
 * cannot be parsed. Thrown to the caller before any record is emitted.
 */
export class TemplateArgumentError extends SpanwireError {
	constructor(
		message: string,
		readonly template: string,
		readonly argument?: string,
	) {
		super(message);
	}
}

/**
 * A value could not be converted to its JSON attribute form.
 */
export class EncodingError extends SpanwireError {}

/**
 * The primary exporter could not deliver a batch.
 */
export class ExportTransportError extends SpanwireError {
	constructor(
		message: string,
		readonly statusCode?: number,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}
}

/**
 * Request body reached the configured limit before it was sent.
 *
 * @example
 * ```typescript
 * new BodyTooLargeError(12, 10).message;
 * // 'Request body is too large (12 bytes), must be less than 10 bytes.'
 * ```
 */
export class BodyTooLargeError extends ExportTransportError {
	constructor(
		readonly size: number,
		readonly maxSize: number,
	) {
		super(
			`Request body is too large (${size} bytes), must be less than ${maxSize} bytes.`,
		);
	}
}

/**
 * Building the structured exception trace failed. Logged, never thrown
 * to application code.
 */
export class CaptureError extends SpanwireError {}

/**
 * A {@link LiveSpan} was used after it ended.
 */
export class SpanStateError extends SpanwireError {}

/**
 * The fallback file exists but was not written by this SDK.
 */
export class FallbackFileError extends SpanwireError {
	constructor(
		message: string,
		readonly path: string,
	) {
		super(message);
	}
}
