import type { HrTime } from '@opentelemetry/api';

export type NsTimestampGenerator = () => bigint;

const NANOS_PER_SECOND = 1_000_000_000n;

// wall clock at load time, advanced by the monotonic clock
const origin = BigInt(Date.now()) * 1_000_000n - process.hrtime.bigint();

export const defaultNsTimestampGenerator: NsTimestampGenerator = () =>
	origin + process.hrtime.bigint();

export function nsToHrTime(ns: bigint): HrTime {
	return [Number(ns / NANOS_PER_SECOND), Number(ns % NANOS_PER_SECOND)];
}
