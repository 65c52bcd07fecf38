import { SpanwireConfig, type SpanwireOptions } from './config';
import { Spanwire } from './lifecycle/Spanwire';

/**
 * Process-wide configuration used by {@link spanwire}.
 */
export const GLOBAL_CONFIG = new SpanwireConfig();

/**
 * Configures the process-wide pipeline. Call once at startup.
 *
 * @example
 * ```typescript
 * import { configure, spanwire } from '@spanwire/sdk';
 *
 * configure({ token: process.env.SPANWIRE_TOKEN, serviceName: 'billing' });
 * spanwire.info('service started');
 * ```
 */
export function configure(options: SpanwireOptions = {}): void {
	GLOBAL_CONFIG.configure(options);
}

export const spanwire = new Spanwire(GLOBAL_CONFIG);
