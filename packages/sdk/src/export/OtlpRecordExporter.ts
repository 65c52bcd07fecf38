import { type ExportResult, ExportResultCode } from '@opentelemetry/core';
import {
	JsonTraceSerializer,
	ProtobufTraceSerializer,
} from '@opentelemetry/otlp-transformer';
import type { ReadableSpan, SpanExporter } from '@opentelemetry/sdk-trace-base';
import { USER_AGENT } from '../constants';
import { EncodingError, ExportTransportError } from '../errors';
import { OtlpHttpSession } from './session';

export type OtlpEncoding = 'protobuf' | 'json';

export interface OtlpRecordExporterOptions {
	/** Full traces endpoint, e.g. `https://api.spanwire.dev/v1/traces` */
	url: string;
	/** Sent verbatim as the `Authorization` header */
	token?: string;
	headers?: Record<string, string>;
	session?: OtlpHttpSession;
	encoding?: OtlpEncoding;
}

const CONTENT_TYPES: Record<OtlpEncoding, string> = {
	protobuf: 'application/x-protobuf',
	json: 'application/json',
};

export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

/**
 * Primary exporter: posts each batch as an OTLP trace request. A batch
 * is sent once; failures are reported to the caller, who decides what
 * to do with the records.
 */
export class OtlpRecordExporter implements SpanExporter {
	private readonly session: OtlpHttpSession;
	private readonly encoding: OtlpEncoding;
	private readonly pending = new Set<Promise<void>>();
	private isShutdown = false;

	constructor(private readonly options: OtlpRecordExporterOptions) {
		this.session = options.session ?? new OtlpHttpSession();
		this.encoding = options.encoding ?? 'protobuf';
	}

	export(
		spans: ReadableSpan[],
		resultCallback: (result: ExportResult) => void,
	): void {
		if (this.isShutdown) {
			resultCallback({
				code: ExportResultCode.FAILED,
				error: new ExportTransportError('Exporter has been shut down'),
			});
			return;
		}

		const request: Promise<void> = this.send(spans)
			.then(
				() => resultCallback({ code: ExportResultCode.SUCCESS }),
				(error: unknown) =>
					resultCallback({
						code: ExportResultCode.FAILED,
						error: toError(error),
					}),
			)
			.finally(() => {
				this.pending.delete(request);
			});
		this.pending.add(request);
	}

	async forceFlush(): Promise<void> {
		await Promise.all(this.pending);
	}

	async shutdown(): Promise<void> {
		this.isShutdown = true;
		await this.forceFlush();
	}

	private serialize(spans: ReadableSpan[]): Uint8Array {
		const serializer =
			this.encoding === 'json' ? JsonTraceSerializer : ProtobufTraceSerializer;
		const body = serializer.serializeRequest(spans);
		if (!body) {
			throw new EncodingError(`Failed to serialize ${spans.length} spans`);
		}
		return body;
	}

	private async send(spans: ReadableSpan[]): Promise<void> {
		const headers: Record<string, string> = {
			...this.options.headers,
			'Content-Type': CONTENT_TYPES[this.encoding],
			'User-Agent': USER_AGENT,
		};
		if (this.options.token) {
			headers.Authorization = this.options.token;
		}

		const response = await this.session.post(
			this.options.url,
			this.serialize(spans),
			headers,
		);
		if (!response.ok) {
			throw new ExportTransportError(
				`Export to ${this.options.url} failed with status ${response.status}`,
				response.status,
			);
		}
	}
}
