import {
	type BearerToken,
	type CallOptions,
	CauseListType,
	type CaseDetailParams,
	type CauseListParams,
	type CourtComplexParams,
	type CourtNamesParams,
	type DistrictsParams,
	type IEnvelopeCodec,
	type IUpstreamSession,
	type JsonObject,
	type JsonValue,
	type NormalizedError,
	OperationKind,
	type OperationParamsMap,
	type Result,
} from '@courtgate/core';
import { Logger } from '@nestjs/common';
import { toNormalizedError } from './error-translator.js';
import { GatewayError } from './gateway-error.js';
import type { IsolatedTransport } from './isolated-transport.js';
import {
	type CauseListInput,
	caseDetailSchema,
	causeListSchema,
	courtComplexSchema,
	courtNamesSchema,
	districtsSchema,
	statesSchema,
} from './operation-params.js';
import type { TokenIssuer } from './token-issuer.js';
import { isJsonObject, parsePlainJson } from './upstream-payload.js';
import { LANGUAGE_FLAGS, type UpstreamIdentity, uidOf } from './upstream-identity.js';

const CAUSE_LIST_FLAGS: Record<CauseListType, string> = {
	[CauseListType.CIVIL]: 'civ_t',
	[CauseListType.CRIMINAL]: 'cri_t',
};

// Upstream selects the list by `causelist_date`; the app always sends "0" here.
const SELECT_PREVIOUS_DAYS = '0';

interface UpstreamCall {
	readonly path: string;
	/** What the call fetches, used in error messages. */
	readonly subject: string;
	readonly body: JsonObject;
}

type Exchange = (call: UpstreamCall) => Promise<JsonValue>;
type OperationPlan = (exchange: Exchange) => Promise<JsonValue>;

export interface CourtOperationsOptions {
	readonly identity: UpstreamIdentity;
	readonly now?: () => Date;
}

function requireToken(token: string | undefined): BearerToken {
	if (token === undefined || token.trim().length === 0) {
		throw new GatewayError('AuthFailure', 'Missing bearer token');
	}
	if (/\s/.test(token)) {
		throw new GatewayError('AuthFailure', 'Malformed bearer token');
	}
	return token;
}

function assertUpstreamStatus(status: number, subject: string): void {
	if (status === 200) return;

	const details = { status };
	if (status === 401 || status === 403) {
		throw new GatewayError('UpstreamAuthFailure', `Upstream rejected the token while fetching ${subject}`, details);
	}
	if (status === 404) {
		throw new GatewayError('NotFound', `Upstream has no ${subject}`, details);
	}
	if (status === 409) {
		throw new GatewayError('Conflict', `Upstream reported a conflict while fetching ${subject}`, details);
	}
	if (status >= 500) {
		throw new GatewayError('UpstreamUnavailable', `Upstream failed with HTTP ${status} while fetching ${subject}`, details);
	}
	throw new GatewayError('InternalError', `Unexpected HTTP ${status} from upstream while fetching ${subject}`, details);
}

/**
 * One entry point per upstream capability. Every call validates its input,
 * opens its own session, encrypts parameters and token, and returns either
 * plain data or a normalized error. Nothing is cached between calls.
 */
export class CourtOperations {
	private readonly logger = new Logger(CourtOperations.name);
	private readonly identity: UpstreamIdentity;
	private readonly now: () => Date;

	constructor(
		private readonly codec: IEnvelopeCodec,
		private readonly transport: IsolatedTransport,
		private readonly tokens: TokenIssuer,
		options: CourtOperationsOptions,
	) {
		this.identity = options.identity;
		this.now = options.now ?? (() => new Date());
	}

	async issueToken(options: CallOptions = {}): Promise<Result<BearerToken>> {
		try {
			return { ok: true, data: await this.tokens.issue(options) };
		} catch (error) {
			return { ok: false, error: this.fail('token', error) };
		}
	}

	async runOperation<K extends OperationKind>(
		kind: K,
		token: string | undefined,
		params: OperationParamsMap[K],
		options: CallOptions = {},
	): Promise<Result<JsonValue>> {
		try {
			const bearer = requireToken(token);
			const plan = this.plan(kind, params);
			const data = await this.transport.withSession(
				(session, signal) => plan((call) => this.exchange(session, signal, bearer, call)),
				options,
			);
			this.logger.log(`${kind} completed`);
			return { ok: true, data };
		} catch (error) {
			return { ok: false, error: this.fail(kind, error) };
		}
	}

	states(token: string | undefined, options?: CallOptions): Promise<Result<JsonValue>> {
		return this.runOperation(OperationKind.STATES, token, {}, options);
	}

	districts(token: string | undefined, params: DistrictsParams, options?: CallOptions): Promise<Result<JsonValue>> {
		return this.runOperation(OperationKind.DISTRICTS, token, params, options);
	}

	courtComplex(
		token: string | undefined,
		params: CourtComplexParams,
		options?: CallOptions,
	): Promise<Result<JsonValue>> {
		return this.runOperation(OperationKind.COURT_COMPLEX, token, params, options);
	}

	courtNames(token: string | undefined, params: CourtNamesParams, options?: CallOptions): Promise<Result<JsonValue>> {
		return this.runOperation(OperationKind.COURT_NAMES, token, params, options);
	}

	causeList(token: string | undefined, params: CauseListParams, options?: CallOptions): Promise<Result<JsonValue>> {
		return this.runOperation(OperationKind.CAUSE_LIST, token, params, options);
	}

	caseDetail(token: string | undefined, params: CaseDetailParams, options?: CallOptions): Promise<Result<JsonValue>> {
		return this.runOperation(OperationKind.CASE_DETAIL, token, params, options);
	}

	// -----------------------------------------------------------------------
	// Validation and request plans
	// -----------------------------------------------------------------------

	/** Validates `params` (throwing before any session opens) and returns the upstream exchange plan. */
	private plan(kind: OperationKind, params: unknown): OperationPlan {
		switch (kind) {
			case OperationKind.STATES: {
				statesSchema.parse(params);
				const time = (this.now().getTime() / 1000).toString();
				return (exchange) =>
					exchange({
						path: 'stateWebService.php',
						subject: 'state data',
						body: { action_code: 'fillState', time },
					});
			}
			case OperationKind.DISTRICTS: {
				const { state_code } = districtsSchema.parse(params);
				return (exchange) =>
					exchange({
						path: 'districtWebService.php',
						subject: 'district data',
						body: { state_code, test_param: 'pending' },
					});
			}
			case OperationKind.COURT_COMPLEX: {
				const { state_code, district_code } = courtComplexSchema.parse(params);
				return (exchange) =>
					exchange({
						path: 'courtEstWebService.php',
						subject: 'court complex data',
						body: { action_code: 'fillCourtComplex', state_code, dist_code: district_code },
					});
			}
			case OperationKind.COURT_NAMES: {
				const { state_code, district_code, court_code } = courtNamesSchema.parse(params);
				return (exchange) =>
					exchange({
						path: 'courtNameWebService.php',
						subject: 'court name data',
						body: { state_code, dist_code: district_code, court_code, ...LANGUAGE_FLAGS },
					});
			}
			case OperationKind.CAUSE_LIST: {
				const input = causeListSchema.parse(params);
				return (exchange) => this.fetchCauseList(exchange, input);
			}
			case OperationKind.CASE_DETAIL: {
				const { cnr } = caseDetailSchema.parse(params);
				return (exchange) => this.fetchCaseDetail(exchange, cnr);
			}
			default: {
				const unknownKind: never = kind;
				throw new GatewayError('InvalidArgument', `Unknown operation: ${String(unknownKind)}`);
			}
		}
	}

	private async fetchCauseList(exchange: Exchange, input: CauseListInput): Promise<JsonValue> {
		try {
			return await exchange({
				path: 'cases_new.php',
				subject: 'cause list data',
				body: {
					state_code: input.state_code,
					dist_code: input.district_code,
					flag: CAUSE_LIST_FLAGS[input.cause_list_type],
					selprevdays: SELECT_PREVIOUS_DAYS,
					court_no: input.court_number,
					court_code: input.court_code,
					causelist_date: input.date.text,
					...LANGUAGE_FLAGS,
					uid: uidOf(this.identity),
				},
			});
		} catch (error) {
			if (error instanceof GatewayError && error.kind === 'DecryptionFailure') {
				throw new GatewayError(
					'DecryptionFailure',
					'Cause list could not be decrypted; upstream only serves cause lists within 30 days of today',
					{ date: input.date.text },
					{ cause: error },
				);
			}
			throw error;
		}
	}

	/**
	 * Registered cases carry a case number in the listing and are read from the
	 * case history service; cases still in filing only have a filing history.
	 */
	private async fetchCaseDetail(exchange: Exchange, cnr: string): Promise<JsonValue> {
		const listing = await exchange({
			path: 'listOfCasesWebService.php',
			subject: 'case listing',
			body: { cino: cnr, version_number: this.identity.appVersion, ...LANGUAGE_FLAGS },
		});

		if (isJsonObject(listing) && listing.case_number !== undefined && listing.case_number !== null) {
			return exchange({
				path: 'caseHistoryWebService.php',
				subject: 'case details',
				body: { cinum: cnr, ...LANGUAGE_FLAGS },
			});
		}

		this.logger.log(`Case ${cnr} has no case number yet, reading filing history`);
		return exchange({
			path: 'filingCaseHistory.php',
			subject: 'filing case details',
			body: { cino: cnr, ...LANGUAGE_FLAGS },
		});
	}

	// -----------------------------------------------------------------------
	// Upstream exchange
	// -----------------------------------------------------------------------

	private async exchange(
		session: IUpstreamSession,
		signal: AbortSignal,
		bearer: BearerToken,
		call: UpstreamCall,
	): Promise<JsonValue> {
		const response = await session.get(
			{
				path: call.path,
				query: { params: this.codec.encrypt(call.body) },
				headers: { authorization: `Bearer ${this.codec.encrypt(bearer)}` },
			},
			signal,
		);

		assertUpstreamStatus(response.status, call.subject);

		const plain = parsePlainJson(response.body);
		if (plain !== undefined) {
			throw new GatewayError('NotFound', `No ${call.subject} found`, { upstream: plain });
		}

		return this.codec.decryptResponse(response.body);
	}

	private fail(operation: string, error: unknown): NormalizedError {
		const normalized = toNormalizedError(error);
		if (normalized.kind === 'InternalError') {
			this.logger.error(
				`${operation} failed: ${normalized.message}`,
				error instanceof Error ? error.stack : undefined,
			);
		} else {
			this.logger.warn(`${operation} failed [${normalized.kind}]: ${normalized.message}`);
		}
		return normalized;
	}
}
