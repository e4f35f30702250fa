import { Body, Controller, Get, Headers, HttpCode, HttpStatus, Inject, Post, Res } from '@nestjs/common';
import type { Response } from 'express';
import { extractBearerToken } from '../common/extract-bearer-token.js';
import { unwrapResult } from '../common/normalized-error.exception.js';
import { abortSignalFor } from '../common/request-abort.js';
import { CourtOperations } from '../gateway/court-operations.js';
import { CauseListDto } from './dto/cause-list.dto.js';
import { CourtComplexDto } from './dto/court-complex.dto.js';
import { CourtNamesDto } from './dto/court-names.dto.js';
import { DistrictsDto } from './dto/districts.dto.js';

@Controller('court')
export class CourtController {
	constructor(@Inject(CourtOperations) private readonly operations: CourtOperations) {}

	@Get('states')
	async states(
		@Headers('authorization') authorization: string | undefined,
		@Res({ passthrough: true }) res: Response,
	) {
		const result = await this.operations.states(extractBearerToken(authorization), {
			signal: abortSignalFor(res),
		});
		return { data: unwrapResult(result) };
	}

	@Post('districts')
	@HttpCode(HttpStatus.OK)
	async districts(
		@Headers('authorization') authorization: string | undefined,
		@Body() body: DistrictsDto,
		@Res({ passthrough: true }) res: Response,
	) {
		const result = await this.operations.districts(extractBearerToken(authorization), body, {
			signal: abortSignalFor(res),
		});
		return { data: unwrapResult(result) };
	}

	@Post('complex')
	@HttpCode(HttpStatus.OK)
	async courtComplex(
		@Headers('authorization') authorization: string | undefined,
		@Body() body: CourtComplexDto,
		@Res({ passthrough: true }) res: Response,
	) {
		const result = await this.operations.courtComplex(extractBearerToken(authorization), body, {
			signal: abortSignalFor(res),
		});
		return { data: unwrapResult(result) };
	}

	@Post('names')
	@HttpCode(HttpStatus.OK)
	async courtNames(
		@Headers('authorization') authorization: string | undefined,
		@Body() body: CourtNamesDto,
		@Res({ passthrough: true }) res: Response,
	) {
		const result = await this.operations.courtNames(extractBearerToken(authorization), body, {
			signal: abortSignalFor(res),
		});
		return { data: unwrapResult(result) };
	}

	@Post('cause-list')
	@HttpCode(HttpStatus.OK)
	async causeList(
		@Headers('authorization') authorization: string | undefined,
		@Body() body: CauseListDto,
		@Res({ passthrough: true }) res: Response,
	) {
		const result = await this.operations.causeList(extractBearerToken(authorization), body, {
			signal: abortSignalFor(res),
		});
		return { data: unwrapResult(result) };
	}
}
