import type { GatewayErrorKind, JsonValue } from '@courtgate/core';
import {
	type ArgumentsHost,
	Catch,
	type ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { NormalizedErrorException } from './normalized-error.exception.js';

function kindForStatus(status: number): GatewayErrorKind {
	switch (status) {
		case HttpStatus.BAD_REQUEST:
		case HttpStatus.UNPROCESSABLE_ENTITY:
			return 'InvalidArgument';
		case HttpStatus.UNAUTHORIZED:
			return 'AuthFailure';
		case HttpStatus.NOT_FOUND:
			return 'NotFound';
		case HttpStatus.CONFLICT:
			return 'Conflict';
		default:
			return 'InternalError';
	}
}

function messageOf(exception: HttpException): string {
	const exResponse = exception.getResponse();
	if (typeof exResponse === 'string') return exResponse;
	if ('message' in exResponse) {
		const { message } = exResponse;
		if (Array.isArray(message)) return message.map(String).join('; ');
		if (typeof message === 'string') return message;
	}
	return exception.message;
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(GlobalExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost): void {
		const response = host.switchToHttp().getResponse<Response>();

		let status = HttpStatus.INTERNAL_SERVER_ERROR;
		let kind: GatewayErrorKind = 'InternalError';
		let message = 'Internal server error';
		let details: Record<string, JsonValue> | undefined;

		if (exception instanceof NormalizedErrorException) {
			status = exception.getStatus();
			kind = exception.error.kind;
			message = exception.error.message;
			details = exception.error.details;
		} else if (exception instanceof HttpException) {
			status = exception.getStatus();
			kind = kindForStatus(status);
			message = messageOf(exception);
		} else if (exception instanceof Error) {
			this.logger.error(exception.message, exception.stack);
		} else {
			this.logger.error(`Non-Error exception caught: ${String(exception)}`);
		}

		const responseBody: Record<string, unknown> = {
			statusCode: status,
			kind,
			message,
			timestamp: new Date().toISOString(),
		};

		if (details !== undefined) {
			responseBody.details = details;
		}

		response.status(status).json(responseBody);
	}
}
