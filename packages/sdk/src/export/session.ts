import { DEFAULT_MAX_BODY_SIZE } from '../constants';
import { BodyTooLargeError } from '../errors';

export type FetchFn = typeof fetch;

export type BodyChunk = Uint8Array | string;

/**
 * A request body: buffered, or produced chunk by chunk.
 */
export type RequestBody =
	| string
	| Uint8Array
	| Iterable<BodyChunk>
	| AsyncIterable<BodyChunk>;

export interface OtlpHttpSessionOptions {
	/** Bodies of this many bytes or more are refused (default 5 MiB) */
	maxBodySize?: number;
	/** Per-request timeout in milliseconds */
	timeoutMillis?: number;
	/** Sent with every request, overridden by per-call headers */
	headers?: Record<string, string>;
	fetch?: FetchFn;
}

/**
 * HTTP transport that refuses oversized bodies before anything goes
 * on the wire. Streamed bodies are measured as their chunks arrive, so
 * production stops at the chunk that crosses the limit.
 *
 * @example
 * ```typescript
 * const session = new OtlpHttpSession({ maxBodySize: 1024 });
 * const response = await session.post(url, payload, {
 *   'Content-Type': 'application/x-protobuf',
 * });
 * ```
 */
export class OtlpHttpSession {
	readonly maxBodySize: number;
	private readonly timeoutMillis: number;
	private readonly headers: Record<string, string>;
	private readonly fetchFn: FetchFn;

	static getFetchFn(fn?: FetchFn): FetchFn {
		if (fn) {
			return fn;
		}
		return globalThis.fetch.bind(globalThis);
	}

	constructor(options: OtlpHttpSessionOptions = {}) {
		this.maxBodySize = options.maxBodySize ?? DEFAULT_MAX_BODY_SIZE;
		this.timeoutMillis = options.timeoutMillis ?? 10_000;
		this.headers = options.headers ?? {};
		this.fetchFn = OtlpHttpSession.getFetchFn(options.fetch);
	}

	/**
	 * Posts `body` to `url`. Never retries.
	 *
	 * @throws {BodyTooLargeError} when the body reaches `maxBodySize`
	 */
	async post(
		url: string,
		body: RequestBody,
		headers: Record<string, string> = {},
	): Promise<Response> {
		const payload = await this.collect(body);

		return this.fetchFn(url, {
			method: 'POST',
			headers: { ...this.headers, ...headers },
			body: payload,
			signal: AbortSignal.timeout(this.timeoutMillis),
		});
	}

	private async collect(body: RequestBody): Promise<string | Uint8Array> {
		if (typeof body === 'string') {
			this.assertSize(Buffer.byteLength(body));
			return body;
		}
		if (body instanceof Uint8Array) {
			this.assertSize(body.byteLength);
			return body;
		}

		const chunks: Uint8Array[] = [];
		let total = 0;
		for await (const chunk of body) {
			const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
			total += bytes.byteLength;
			this.assertSize(total);
			chunks.push(bytes);
		}
		return Buffer.concat(chunks);
	}

	private assertSize(size: number): void {
		if (size >= this.maxBodySize) {
			throw new BodyTooLargeError(size, this.maxBodySize);
		}
	}
}
