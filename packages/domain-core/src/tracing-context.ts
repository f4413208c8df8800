/**
 * Correlation IDs for the request being served, held in AsyncLocalStorage.
 *
 * An HTTP layer reads them from `X-Correlation-ID` / `X-Causation-ID` and
 * runs the request inside runWithContext(); ExecutionContext.create() then
 * picks them up without anything being threaded through.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface TracingContextData {
	correlationId: string | null;
	causationId: string | null;
}

type HeaderBag = Record<string, string | string[] | undefined>;

const CORRELATION_ID_HEADER = 'X-Correlation-ID';
const CAUSATION_ID_HEADER = 'X-Causation-ID';

const tracingStore = new AsyncLocalStorage<TracingContextData>();

const newTraceId = (): string => `trace-${randomUUID()}`;

/** First value of a header, matched as written or lower-cased */
function readHeader(headers: HeaderBag, name: string): string | null {
	const raw = headers[name] ?? headers[name.toLowerCase()];
	const value = Array.isArray(raw) ? raw[0] : raw;
	return value ?? null;
}

export const TracingContext = {
	CORRELATION_ID_HEADER,
	CAUSATION_ID_HEADER,

	current(): TracingContextData | null {
		return tracingStore.getStore() ?? null;
	},

	/**
	 * Correlation ID of the active context. One is generated when missing and
	 * stored, so later calls in the same context agree. Outside any context
	 * every call returns a fresh ID.
	 */
	getCorrelationId(): string {
		const data = tracingStore.getStore();
		if (!data) {
			return newTraceId();
		}
		if (!data.correlationId) {
			data.correlationId = newTraceId();
		}
		return data.correlationId;
	},

	getCausationId(): string | null {
		return tracingStore.getStore()?.causationId ?? null;
	},

	runWithContext<T>(correlationId: string | null, causationId: string | null, fn: () => T): T {
		return tracingStore.run({ correlationId, causationId }, fn);
	},

	fromHeaders(headers: HeaderBag): TracingContextData {
		return {
			correlationId: readHeader(headers, CORRELATION_ID_HEADER),
			causationId: readHeader(headers, CAUSATION_ID_HEADER),
		};
	},
};
