import type { GatewayErrorKind, JsonValue, NormalizedError } from '@courtgate/core';

/**
 * The only error type raised inside the gateway. Callers never see it
 * directly; `toNormalizedError` turns it into a plain `NormalizedError`.
 */
export class GatewayError extends Error {
	constructor(
		public readonly kind: GatewayErrorKind,
		message: string,
		public readonly details?: Record<string, JsonValue>,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = 'GatewayError';
	}

	toNormalized(): NormalizedError {
		if (this.details === undefined) {
			return { kind: this.kind, message: this.message };
		}
		return { kind: this.kind, message: this.message, details: this.details };
	}
}
