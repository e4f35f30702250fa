import type { JsonValue } from './json.js';

/**
 * Closed set of failure kinds that may leave the gateway core. Every internal
 * failure is translated into exactly one of these before it reaches a caller.
 */
export const GATEWAY_ERROR_KINDS = [
	'InvalidArgument',
	'AuthFailure',
	'UpstreamAuthFailure',
	'NotFound',
	'Conflict',
	'MalformedPayload',
	'DecryptionFailure',
	'UpstreamTimeout',
	'UpstreamUnavailable',
	'InternalError',
] as const;

export type GatewayErrorKind = (typeof GATEWAY_ERROR_KINDS)[number];

export interface NormalizedError {
	readonly kind: GatewayErrorKind;
	readonly message: string;
	readonly details?: Record<string, JsonValue>;
}

export type Result<T> =
	| { readonly ok: true; readonly data: T }
	| { readonly ok: false; readonly error: NormalizedError };
