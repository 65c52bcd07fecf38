import type { Meter } from '@opentelemetry/api';
import type { SpanwireConfig } from '../config';
import { ATTR_LEVEL, ATTR_SPAN_TYPE, type Level } from '../constants';
import { type CallSite, encode } from '../encoding/attributes';
import { captureException } from '../exceptions/capture';
import { LiveSpan } from './LiveSpan';
import { findCallSite } from './callsite';
import { nsToHrTime } from './clock';

export type NamedValues = Record<string, unknown>;

export interface SpanOptions {
	/** Span name; defaults to the template. Also fills `{span_name}` */
	spanName?: string;
	/** Appended to the handle's tags for this span only */
	tags?: readonly string[];
}

export interface LogOptions {
	/** Recorded as an `exception` event on the log record */
	error?: unknown;
	tags?: readonly string[];
}

export interface InstrumentOptions<A extends unknown[]> {
	/** Maps call arguments to the values the template renders */
	extractArgs?: (...args: A) => NamedValues;
	/** Defaults to the function's name */
	spanName?: string;
}

/**
 * Entry point for emitting spans and logs. Handles are immutable: tags
 * are bound by creating a new handle with {@link Spanwire.tags}.
 *
 * @example
 * ```typescript
 * const checkout = spanwire.tags('checkout');
 *
 * await checkout.span('charge {amount}', async (span) => {
 *   span.setAttribute('provider', 'stripe');
 *   await charge();
 * }, { amount: 42 });
 *
 * checkout.info('charged {amount}', { amount: 42 });
 * ```
 */
export class Spanwire {
	constructor(
		private readonly config: SpanwireConfig,
		readonly tagList: readonly string[] = [],
	) {}

	/**
	 * New handle whose records carry this handle's tags followed by `names`.
	 */
	tags(...names: string[]): Spanwire {
		return new Spanwire(this.config, [...this.tagList, ...names]);
	}

	/**
	 * Runs `fn` inside a span. The span ends when `fn` settles, unless
	 * `fn` sets `span.endOnExit = false`.
	 *
	 * @throws {TemplateArgumentError} when the template references a missing value
	 */
	async span<T>(
		template: string,
		fn: (span: LiveSpan) => Promise<T> | T,
		attributes: NamedValues = {},
		options: SpanOptions = {},
	): Promise<T> {
		const span = this.createSpan(template, attributes, options, findCallSite());
		return span.activate(fn);
	}

	/**
	 * Synchronous version of {@link span}.
	 */
	spanSync<T>(
		template: string,
		fn: (span: LiveSpan) => T,
		attributes: NamedValues = {},
		options: SpanOptions = {},
	): T {
		const span = this.createSpan(template, attributes, options, findCallSite());
		return span.activateSync(fn);
	}

	/**
	 * Opens a span parented to the active one and returns it without
	 * activating it. The caller ends it with `end()` or `activate()`.
	 */
	startSpan(
		template: string,
		attributes: NamedValues = {},
		options: SpanOptions = {},
	): LiveSpan {
		const span = this.createSpan(template, attributes, options, findCallSite());
		span.start();
		return span;
	}

	/**
	 * Emits a single zero-duration log record named after the rendered
	 * message.
	 */
	log(
		level: Level,
		template: string,
		attributes: NamedValues = {},
		options: LogOptions = {},
	): void {
		const { tracer, clock, logger } = this.config.initialize();
		const { message, attributes: encoded } = encode(
			template,
			undefined,
			this.mergeTags(options.tags),
			attributes,
			{ callSite: findCallSite(), logger },
		);

		const time = nsToHrTime(clock());
		const record = tracer.startSpan(message, {
			startTime: time,
			attributes: {
				...encoded,
				[ATTR_LEVEL]: level,
				[ATTR_SPAN_TYPE]: 'log',
			},
		});
		if (options.error !== undefined) {
			captureException(record, options.error, time, logger);
		}
		record.end(time);
	}

	trace(template: string, attributes?: NamedValues, options?: LogOptions) {
		this.log('trace', template, attributes, options);
	}

	debug(template: string, attributes?: NamedValues, options?: LogOptions) {
		this.log('debug', template, attributes, options);
	}

	info(template: string, attributes?: NamedValues, options?: LogOptions) {
		this.log('info', template, attributes, options);
	}

	notice(template: string, attributes?: NamedValues, options?: LogOptions) {
		this.log('notice', template, attributes, options);
	}

	warn(template: string, attributes?: NamedValues, options?: LogOptions) {
		this.log('warn', template, attributes, options);
	}

	error(template: string, attributes?: NamedValues, options?: LogOptions) {
		this.log('error', template, attributes, options);
	}

	fatal(template: string, attributes?: NamedValues, options?: LogOptions) {
		this.log('fatal', template, attributes, options);
	}

	/**
	 * Wraps `fn` so every call runs in a span named after it.
	 *
	 * @example
	 * ```typescript
	 * const resize = spanwire.instrument(
	 *   'resize {width}x{height}',
	 *   function resize(width: number, height: number) { ... },
	 *   { extractArgs: (width, height) => ({ width, height }) },
	 * );
	 * ```
	 */
	instrument<A extends unknown[], R>(
		template: string,
		fn: (...args: A) => R,
		options: InstrumentOptions<A> = {},
	): (...args: A) => R {
		const callSite = this.definitionSite(fn);
		const spanOptions = { spanName: options.spanName ?? (fn.name || template) };

		return (...args: A): R =>
			this.createSpan(
				template,
				options.extractArgs?.(...args) ?? {},
				spanOptions,
				callSite,
			).activateSync(() => fn(...args));
	}

	/**
	 * Async version of {@link instrument}; the span ends when the
	 * returned promise settles.
	 */
	instrumentAsync<A extends unknown[], R>(
		template: string,
		fn: (...args: A) => Promise<R>,
		options: InstrumentOptions<A> = {},
	): (...args: A) => Promise<R> {
		const callSite = this.definitionSite(fn);
		const spanOptions = { spanName: options.spanName ?? (fn.name || template) };

		return async (...args: A): Promise<R> =>
			this.createSpan(
				template,
				options.extractArgs?.(...args) ?? {},
				spanOptions,
				callSite,
			).activate(() => fn(...args));
	}

	getMeter(name: string, version?: string): Meter {
		return this.config.meterProvider.getMeter(name, version);
	}

	forceFlush(): Promise<void> {
		return this.config.forceFlush();
	}

	shutdown(): Promise<void> {
		return this.config.shutdown();
	}

	private mergeTags(extra: readonly string[] = []): string[] {
		return [...this.tagList, ...extra];
	}

	private definitionSite(fn: { name: string }): CallSite | undefined {
		const callSite = findCallSite();
		return callSite && fn.name ? { ...callSite, function: fn.name } : callSite;
	}

	private createSpan(
		template: string,
		attributes: NamedValues,
		options: SpanOptions,
		callSite: CallSite | undefined,
	): LiveSpan {
		const { tracer, clock, logger } = this.config.initialize();
		const { attributes: encoded } = encode(
			template,
			options.spanName,
			this.mergeTags(options.tags),
			attributes,
			{ callSite, logger },
		);

		return new LiveSpan({
			tracer,
			clock,
			logger,
			name: options.spanName ?? template,
			attributes: encoded,
		});
	}
}
