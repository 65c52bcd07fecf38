/**
 * Deterministic helpers for asserting on emitted records.
 *
 * @example
 * ```typescript
 * const exporter = new TestExporter();
 * const config = new SpanwireConfig({
 *   processors: [new SimpleSpanProcessor(exporter)],
 *   idGenerator: new IncrementalIdGenerator(),
 *   nsTimestampGenerator: new TimeGenerator().next,
 * });
 * ```
 *
 * @module
 */
import type { Attributes } from '@opentelemetry/api';
import { hrTimeToNanoseconds } from '@opentelemetry/core';
import {
	type IdGenerator,
	InMemorySpanExporter,
	type ReadableSpan,
} from '@opentelemetry/sdk-trace-base';

export interface SpanContextDict {
	trace_id: number;
	span_id: number;
}

export interface EventDict {
	name: string;
	timestamp: number;
	attributes: Attributes;
}

export interface SpanDict {
	name: string;
	context: SpanContextDict;
	parent: SpanContextDict | null;
	start_time: number;
	end_time: number;
	attributes: Attributes;
	events?: EventDict[];
}

function hexToNumber(id: string): number {
	return Number.parseInt(id, 16);
}

/**
 * In-memory exporter that also renders records as plain objects with
 * numeric ids and nanosecond timestamps.
 */
export class TestExporter extends InMemorySpanExporter {
	exportedSpansAsDict(): SpanDict[] {
		return this.getFinishedSpans().map((span) => spanToDict(span));
	}
}

export function spanToDict(span: ReadableSpan): SpanDict {
	const { traceId, spanId } = span.spanContext();
	const dict: SpanDict = {
		name: span.name,
		context: { trace_id: hexToNumber(traceId), span_id: hexToNumber(spanId) },
		parent: span.parentSpanId
			? {
					trace_id: hexToNumber(traceId),
					span_id: hexToNumber(span.parentSpanId),
				}
			: null,
		start_time: hrTimeToNanoseconds(span.startTime),
		end_time: hrTimeToNanoseconds(span.endTime),
		attributes: { ...span.attributes },
	};

	if (span.events.length > 0) {
		dict.events = span.events.map((event) => ({
			name: event.name,
			timestamp: hrTimeToNanoseconds(event.time),
			attributes: { ...event.attributes },
		}));
	}

	return dict;
}

/**
 * Ids counting up from 1, so tests can name them.
 */
export class IncrementalIdGenerator implements IdGenerator {
	private traceId = 0;
	private spanId = 0;

	generateTraceId(): string {
		this.traceId++;
		return this.traceId.toString(16).padStart(32, '0');
	}

	generateSpanId(): string {
		this.spanId++;
		return this.spanId.toString(16).padStart(16, '0');
	}

	reset(): void {
		this.traceId = 0;
		this.spanId = 0;
	}
}

/**
 * Clock advancing one second per reading, starting at one second.
 */
export class TimeGenerator {
	private ns = 0n;

	next = (): bigint => {
		this.ns += 1_000_000_000n;
		return this.ns;
	};
}
