import { Controller, Get, Headers, Inject, Query, Res } from '@nestjs/common';
import type { Response } from 'express';
import { extractBearerToken } from '../common/extract-bearer-token.js';
import { unwrapResult } from '../common/normalized-error.exception.js';
import { abortSignalFor } from '../common/request-abort.js';
import { CourtOperations } from '../gateway/court-operations.js';
import { CaseDetailQueryDto } from './dto/case-detail-query.dto.js';

@Controller('cases')
export class CaseController {
	constructor(@Inject(CourtOperations) private readonly operations: CourtOperations) {}

	/** Case record by CNR; cases still in filing return their filing history. */
	@Get('details')
	async details(
		@Headers('authorization') authorization: string | undefined,
		@Query() query: CaseDetailQueryDto,
		@Res({ passthrough: true }) res: Response,
	) {
		const result = await this.operations.caseDetail(
			extractBearerToken(authorization),
			{ cnr: query.cnr },
			{ signal: abortSignalFor(res) },
		);
		return { data: unwrapResult(result) };
	}
}
