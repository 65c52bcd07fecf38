import type { ExportResult } from '@opentelemetry/core';
import {
	BasicTracerProvider,
	InMemorySpanExporter,
	type ReadableSpan,
	SimpleSpanProcessor,
	type SpanExporter,
} from '@opentelemetry/sdk-trace-base';
import type { Logger } from '@spanwire/logger';
import { vi } from 'vitest';

export function createMockLogger() {
	const child = vi.fn<(bindings: Record<string, unknown>) => Logger>();
	const logger = {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		fatal: vi.fn(),
		trace: vi.fn(),
		child,
	};
	child.mockReturnValue(logger);
	return logger;
}

/**
 * Finished spans with the given names, one trace each.
 */
export function createSpans(...names: string[]): ReadableSpan[] {
	const exporter = new InMemorySpanExporter();
	const provider = new BasicTracerProvider();
	provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
	const tracer = provider.getTracer('test');

	for (const name of names) {
		tracer.startSpan(name).end();
	}
	return exporter.getFinishedSpans();
}

export function exportSpans(
	exporter: SpanExporter,
	spans: ReadableSpan[],
): Promise<ExportResult> {
	return new Promise((resolve) => exporter.export(spans, resolve));
}
