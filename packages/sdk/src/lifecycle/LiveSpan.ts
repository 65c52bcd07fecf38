import {
	type Attributes,
	type Context,
	type HrTime,
	type Span,
	type Tracer,
	context,
	trace,
} from '@opentelemetry/api';
import type { Logger } from '@spanwire/logger';
import {
	ATTR_SPAN_TYPE,
	ATTR_START_PARENT_ID,
	START_SPAN_SUFFIX,
} from '../constants';
import { encodeValue, isReservedKey } from '../encoding/attributes';
import { SpanStateError } from '../errors';
import { captureException } from '../exceptions/capture';
import { type NsTimestampGenerator, nsToHrTime } from './clock';

export type LiveSpanState = 'created' | 'started' | 'ended';

export interface LiveSpanInit {
	tracer: Tracer;
	name: string;
	attributes: Attributes;
	clock: NsTimestampGenerator;
	logger: Logger;
	/** Context to parent under; defaults to the active one at start */
	parentContext?: Context;
}

export interface ActivateOptions {
	/** Overrides {@link LiveSpan.endOnExit} for this activation */
	endOnExit?: boolean;
}

/**
 * Decimal form of a hex span id, `'0'` for no span.
 */
export function spanIdToDecimal(spanId: string | undefined): string {
	if (!spanId) return '0';
	return BigInt(`0x${spanId}`).toString();
}

/**
 * A span whose opening is published before it closes.
 *
 * Starting emits a zero-duration shadow record (`<name> (start)`),
 * parented to the real span, so viewers can show the span while it runs.
 * The real span is emitted once, when it ends.
 *
 * @example
 * ```typescript
 * const span = spanwire.startSpan('sync {source}', { source: 'crm' });
 * await span.activate(async () => {
 *   await pull();
 * });
 * ```
 */
export class LiveSpan {
	private _state: LiveSpanState = 'created';
	private span: Span | undefined;
	private activeContext: Context | undefined;
	private readonly recorded = new Set<unknown>();

	/** Whether leaving an activation ends the span */
	endOnExit = true;

	constructor(private readonly init: LiveSpanInit) {}

	get state(): LiveSpanState {
		return this._state;
	}

	get name(): string {
		return this.init.name;
	}

	get spanContext() {
		return this.span?.spanContext();
	}

	/**
	 * Opens the span and emits its shadow record. Returns the context in
	 * which the span is active.
	 */
	start(): Context {
		if (this._state === 'ended') {
			throw new SpanStateError(`Span "${this.name}" has already ended`);
		}
		if (this.activeContext) {
			return this.activeContext;
		}

		const { tracer, name, attributes, clock } = this.init;
		const parentContext = this.init.parentContext ?? context.active();
		const parentSpanId = trace.getSpan(parentContext)?.spanContext().spanId;
		const startTime = nsToHrTime(clock());

		const span = tracer.startSpan(
			name,
			{ startTime, attributes: { ...attributes, [ATTR_SPAN_TYPE]: 'span' } },
			parentContext,
		);
		const activeContext = trace.setSpan(parentContext, span);

		const shadow = tracer.startSpan(
			`${name}${START_SPAN_SUFFIX}`,
			{
				startTime,
				attributes: {
					...attributes,
					[ATTR_SPAN_TYPE]: 'start_span',
					[ATTR_START_PARENT_ID]: spanIdToDecimal(parentSpanId),
				},
			},
			activeContext,
		);
		shadow.end(startTime);

		this.span = span;
		this.activeContext = activeContext;
		this._state = 'started';
		return activeContext;
	}

	/**
	 * Stores a named value on the real span using the encoder's rules.
	 * `null`/`undefined` and reserved keys are ignored.
	 */
	setAttribute(key: string, value: unknown): this {
		if (isReservedKey(key)) return this;
		const encoded = encodeValue(key, value, this.init.logger);
		if (encoded.kind === 'attribute') {
			this.requireSpan().setAttribute(encoded.key, encoded.value);
		}
		return this;
	}

	/**
	 * Runs `fn` with this span active, starting it if needed.
	 */
	async activate<T>(
		fn: (span: LiveSpan) => Promise<T> | T,
		options: ActivateOptions = {},
	): Promise<T> {
		const activeContext = this.enter(options);

		try {
			const result = await context.with(activeContext, () => fn(this));
			this.exit();
			return result;
		} catch (error) {
			this.exit(error);
			throw error;
		}
	}

	/**
	 * Synchronous version of {@link activate}.
	 */
	activateSync<T>(fn: (span: LiveSpan) => T, options: ActivateOptions = {}): T {
		const activeContext = this.enter(options);

		try {
			const result = context.with(activeContext, () => fn(this));
			this.exit();
			return result;
		} catch (error) {
			this.exit(error);
			throw error;
		}
	}

	/**
	 * Ends the span now. Passing an error records it first, unless an
	 * earlier activation already recorded it. Ending an ended span does
	 * nothing.
	 */
	end(error?: unknown): void {
		if (this._state === 'ended') return;
		const span = this.requireSpan();
		const endTime = nsToHrTime(this.init.clock());

		try {
			this.record(span, error, endTime);
		} finally {
			span.end(endTime);
			this._state = 'ended';
		}
	}

	private enter(options: ActivateOptions): Context {
		if (this._state === 'ended') {
			throw new SpanStateError(`Span "${this.name}" has already ended`);
		}
		if (options.endOnExit !== undefined) {
			this.endOnExit = options.endOnExit;
		}
		return this.start();
	}

	private exit(error?: unknown): void {
		if (this._state === 'ended') return;
		if (this.endOnExit) {
			this.end(error);
			return;
		}
		if (error !== undefined) {
			this.record(this.requireSpan(), error, nsToHrTime(this.init.clock()));
		}
	}

	private record(span: Span, error: unknown, time: HrTime): void {
		if (error === undefined || this.recorded.has(error)) return;
		this.recorded.add(error);
		captureException(span, error, time, this.init.logger);
	}

	private requireSpan(): Span {
		if (!this.span) {
			throw new SpanStateError(`Span "${this.name}" has not started`);
		}
		return this.span;
	}
}
