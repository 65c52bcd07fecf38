import { type ExportResult, ExportResultCode } from '@opentelemetry/core';
import type { ReadableSpan, SpanExporter } from '@opentelemetry/sdk-trace-base';
import type { Logger } from '@spanwire/logger';
import { toError } from './OtlpRecordExporter';

/**
 * Sends batches to `primary` and diverts any batch it rejects to
 * `fallback`. Upstream sees success whenever the batch ended up in
 * either place.
 *
 * @example
 * ```typescript
 * const exporter = new FallbackRecordExporter(
 *   new OtlpRecordExporter({ url, token }),
 *   new FileRecordExporter('spanwire_spans.bin', logger),
 *   logger,
 * );
 * ```
 */
export class FallbackRecordExporter implements SpanExporter {
	constructor(
		readonly primary: SpanExporter,
		readonly fallback: SpanExporter,
		private readonly logger: Logger,
	) {}

	export(
		spans: ReadableSpan[],
		resultCallback: (result: ExportResult) => void,
	): void {
		try {
			this.primary.export(spans, (result) => {
				if (result.code === ExportResultCode.SUCCESS) {
					resultCallback(result);
					return;
				}
				this.divert(spans, resultCallback, result.error);
			});
		} catch (error) {
			this.divert(spans, resultCallback, toError(error));
		}
	}

	async forceFlush(): Promise<void> {
		await Promise.all([
			this.primary.forceFlush?.(),
			this.fallback.forceFlush?.(),
		]);
	}

	async shutdown(): Promise<void> {
		await Promise.all([this.primary.shutdown(), this.fallback.shutdown()]);
	}

	private divert(
		spans: ReadableSpan[],
		resultCallback: (result: ExportResult) => void,
		error: Error | undefined,
	): void {
		this.logger.warn(
			{ count: spans.length, error: error?.message },
			'Primary export failed, writing spans to fallback',
		);
		this.fallback.export(spans, (result) => {
			resultCallback(
				result.code === ExportResultCode.SUCCESS
					? { code: ExportResultCode.SUCCESS }
					: result,
			);
		});
	}
}
