import { existsSync } from 'node:fs';
import { mkdir, open, readFile, rm } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { ProtobufTraceSerializer } from '@opentelemetry/otlp-transformer';
import type { ReadableSpan } from '@opentelemetry/sdk-trace-base';
import { USER_AGENT } from '../constants';
import {
	EncodingError,
	ExportTransportError,
	FallbackFileError,
} from '../errors';
import type { OtlpHttpSession } from './session';

/**
 * First bytes of every fallback file. Each batch follows as a 4-byte
 * big-endian length and that many bytes of OTLP protobuf.
 */
export const FALLBACK_FILE_HEADER = 'SPANWIRE BACKUP FILE v1\n';

const HEADER_BYTES = Buffer.from(FALLBACK_FILE_HEADER, 'utf8');
const LENGTH_BYTES = 4;

export interface FallbackFileContents {
	/** Serialized trace requests in write order */
	batches: Uint8Array[];
	/** Bytes after the last complete batch */
	truncatedBytes: number;
}

function isHeaderPrefix(bytes: Buffer): boolean {
	return (
		bytes.byteLength < HEADER_BYTES.byteLength &&
		HEADER_BYTES.subarray(0, bytes.byteLength).equals(bytes)
	);
}

export function encodeFrame(payload: Uint8Array): Buffer {
	const frame = Buffer.alloc(LENGTH_BYTES + payload.byteLength);
	frame.writeUInt32BE(payload.byteLength, 0);
	frame.set(payload, LENGTH_BYTES);
	return frame;
}

const pendingAppends = new Map<string, Promise<void>>();

async function writeBatch(path: string, payload: Uint8Array): Promise<void> {
	await mkdir(dirname(path), { recursive: true });

	const handle = await open(path, 'a+');
	try {
		const { size } = await handle.stat();
		const head = Buffer.alloc(Math.min(size, HEADER_BYTES.byteLength));
		await handle.read(head, 0, head.byteLength, 0);

		const frame = encodeFrame(payload);
		if (size === 0 || isHeaderPrefix(head)) {
			// a header cut short by a crash is rewritten
			await handle.truncate(0);
			await handle.write(Buffer.concat([HEADER_BYTES, frame]));
			return;
		}
		if (!head.equals(HEADER_BYTES)) {
			throw new FallbackFileError(
				`${path} is not a spanwire fallback file`,
				path,
			);
		}
		await handle.write(frame);
	} finally {
		await handle.close();
	}
}

/**
 * Appends one batch to the fallback file, creating the file and its
 * directory when missing. Appends to the same path are serialized
 * across exporters in the process.
 *
 * @throws {FallbackFileError} when the file has a foreign header
 */
export function appendBatch(
	path: string,
	spans: ReadableSpan[],
): Promise<void> {
	const payload = ProtobufTraceSerializer.serializeRequest(spans);
	if (!payload) {
		return Promise.reject(
			new EncodingError(`Failed to serialize ${spans.length} spans`),
		);
	}

	const key = resolve(path);
	const previous = pendingAppends.get(key) ?? Promise.resolve();
	const append = previous.then(() => writeBatch(path, payload));
	const settled = append.then(
		() => undefined,
		() => undefined,
	);
	pendingAppends.set(key, settled);
	void settled.then(() => {
		if (pendingAppends.get(key) === settled) {
			pendingAppends.delete(key);
		}
	});

	return append;
}

/**
 * Reads every complete batch from a fallback file. A missing file reads
 * as empty.
 *
 * @example
 * ```typescript
 * const { batches, truncatedBytes } = await readFallbackFile('spanwire_spans.bin');
 * ```
 */
export async function readFallbackFile(
	path: string,
): Promise<FallbackFileContents> {
	if (!existsSync(path)) {
		return { batches: [], truncatedBytes: 0 };
	}

	const data = await readFile(path);
	if (data.byteLength === 0 || isHeaderPrefix(data)) {
		return { batches: [], truncatedBytes: data.byteLength };
	}
	if (!data.subarray(0, HEADER_BYTES.byteLength).equals(HEADER_BYTES)) {
		throw new FallbackFileError(
			`${path} is not a spanwire fallback file`,
			path,
		);
	}

	const batches: Uint8Array[] = [];
	let offset = HEADER_BYTES.byteLength;
	while (offset + LENGTH_BYTES <= data.byteLength) {
		const length = data.readUInt32BE(offset);
		const end = offset + LENGTH_BYTES + length;
		if (end > data.byteLength) break;

		batches.push(data.subarray(offset + LENGTH_BYTES, end));
		offset = end;
	}

	return { batches, truncatedBytes: data.byteLength - offset };
}

export interface ReplayOptions {
	/** Traces endpoint the batches are posted to */
	url: string;
	token?: string;
	/** Delete the file once every batch was accepted */
	clear?: boolean;
}

/**
 * Posts the batches of a fallback file in write order. Stops at the
 * first rejected batch.
 *
 * @returns the number of batches delivered
 */
export async function replayFallbackFile(
	path: string,
	session: OtlpHttpSession,
	options: ReplayOptions,
): Promise<number> {
	const { batches } = await readFallbackFile(path);
	const headers: Record<string, string> = {
		'Content-Type': 'application/x-protobuf',
		'User-Agent': USER_AGENT,
	};
	if (options.token) {
		headers.Authorization = options.token;
	}

	for (const batch of batches) {
		const response = await session.post(options.url, batch, headers);
		if (!response.ok) {
			throw new ExportTransportError(
				`Replay to ${options.url} failed with status ${response.status}`,
				response.status,
			);
		}
	}

	if (options.clear) {
		await rm(path, { force: true });
	}
	return batches.length;
}
