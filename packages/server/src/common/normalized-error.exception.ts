import type { GatewayErrorKind, NormalizedError, Result } from '@courtgate/core';
import { HttpException, HttpStatus } from '@nestjs/common';

export const KIND_STATUS: Record<GatewayErrorKind, HttpStatus> = {
	InvalidArgument: HttpStatus.BAD_REQUEST,
	AuthFailure: HttpStatus.UNAUTHORIZED,
	UpstreamAuthFailure: HttpStatus.UNAUTHORIZED,
	NotFound: HttpStatus.NOT_FOUND,
	Conflict: HttpStatus.CONFLICT,
	MalformedPayload: HttpStatus.BAD_GATEWAY,
	DecryptionFailure: HttpStatus.INTERNAL_SERVER_ERROR,
	UpstreamTimeout: HttpStatus.GATEWAY_TIMEOUT,
	UpstreamUnavailable: HttpStatus.BAD_GATEWAY,
	InternalError: HttpStatus.INTERNAL_SERVER_ERROR,
};

/** Carries a gateway `NormalizedError` through Nest's exception layer. */
export class NormalizedErrorException extends HttpException {
	constructor(readonly error: NormalizedError) {
		super(error, KIND_STATUS[error.kind]);
	}
}

export function unwrapResult<T>(result: Result<T>): T {
	if (result.ok) return result.data;
	throw new NormalizedErrorException(result.error);
}
