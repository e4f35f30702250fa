export type { JsonObject, JsonPrimitive, JsonValue } from './json.js';
export { GATEWAY_ERROR_KINDS } from './gateway-error.js';
export type { GatewayErrorKind, NormalizedError, Result } from './gateway-error.js';
export { CauseListType, OperationKind } from './operation.js';
export type {
	BearerToken,
	CallOptions,
	CaseDetailParams,
	CauseListParams,
	CourtComplexParams,
	CourtNamesParams,
	DistrictsParams,
	OperationParamsMap,
	StatesParams,
} from './operation.js';
