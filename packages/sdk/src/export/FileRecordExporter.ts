import { type ExportResult, ExportResultCode } from '@opentelemetry/core';
import type { ReadableSpan, SpanExporter } from '@opentelemetry/sdk-trace-base';
import type { Logger } from '@spanwire/logger';
import { appendBatch } from './fallbackFile';
import { toError } from './OtlpRecordExporter';

/**
 * Durable exporter writing each batch to an append-only fallback file.
 * Writes happen one at a time in the order batches arrive, and keep
 * working after shutdown so late records are not lost.
 */
export class FileRecordExporter implements SpanExporter {
	private writes: Promise<void> = Promise.resolve();

	constructor(
		readonly path: string,
		private readonly logger: Logger,
	) {}

	export(
		spans: ReadableSpan[],
		resultCallback: (result: ExportResult) => void,
	): void {
		this.writes = this.writes
			.then(() => appendBatch(this.path, spans))
			.then(
				() => resultCallback({ code: ExportResultCode.SUCCESS }),
				(error: unknown) => {
					const failure = toError(error);
					this.logger.error(
						{ path: this.path, count: spans.length, error: failure.message },
						'Failed to write spans to fallback file',
					);
					resultCallback({ code: ExportResultCode.FAILED, error: failure });
				},
			)
			.catch((error: unknown) => {
				this.logger.error(
					{ path: this.path, error: toError(error).message },
					'Fallback export callback threw',
				);
			});
	}

	forceFlush(): Promise<void> {
		return this.writes;
	}

	shutdown(): Promise<void> {
		return this.forceFlush();
	}
}
