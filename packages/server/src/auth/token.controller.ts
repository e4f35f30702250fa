import { Controller, HttpCode, HttpStatus, Inject, Post, Res } from '@nestjs/common';
import type { Response } from 'express';
import { unwrapResult } from '../common/normalized-error.exception.js';
import { abortSignalFor } from '../common/request-abort.js';
import { CourtOperations } from '../gateway/court-operations.js';

@Controller('auth')
export class TokenController {
	constructor(@Inject(CourtOperations) private readonly operations: CourtOperations) {}

	/**
	 * Obtain a fresh upstream token. Pass it back as `Authorization: Bearer <token>`
	 * on the court and case routes; it expires upstream after about ten minutes.
	 */
	@Post('token')
	@HttpCode(HttpStatus.OK)
	async issue(@Res({ passthrough: true }) res: Response) {
		const token = unwrapResult(await this.operations.issueToken({ signal: abortSignalFor(res) }));
		return { token };
	}
}
