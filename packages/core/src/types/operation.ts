export enum OperationKind {
	STATES = 'states',
	DISTRICTS = 'districts',
	COURT_COMPLEX = 'courtComplex',
	COURT_NAMES = 'courtNames',
	CAUSE_LIST = 'causeList',
	CASE_DETAIL = 'caseDetail',
}

export enum CauseListType {
	CIVIL = 'CIVIL',
	CRIMINAL = 'CRIMINAL',
}

export type BearerToken = string;

export type StatesParams = Record<string, never>;

export interface DistrictsParams {
	readonly state_code: string;
}

export interface CourtComplexParams {
	readonly state_code: string;
	readonly district_code: string;
}

export interface CourtNamesParams {
	readonly state_code: string;
	readonly district_code: string;
	readonly court_code: string;
}

export interface CauseListParams {
	readonly state_code: string;
	readonly district_code: string;
	readonly court_code: string;
	readonly court_number: string;
	readonly cause_list_type: string;
	/** DD-MM-YYYY */
	readonly date: string;
}

export interface CaseDetailParams {
	readonly cnr: string;
}

export interface OperationParamsMap {
	[OperationKind.STATES]: StatesParams;
	[OperationKind.DISTRICTS]: DistrictsParams;
	[OperationKind.COURT_COMPLEX]: CourtComplexParams;
	[OperationKind.COURT_NAMES]: CourtNamesParams;
	[OperationKind.CAUSE_LIST]: CauseListParams;
	[OperationKind.CASE_DETAIL]: CaseDetailParams;
}

export interface CallOptions {
	/** Overrides the configured upstream deadline for this call. */
	readonly deadlineMs?: number;
	/** Aborting releases the upstream session and fails the call. */
	readonly signal?: AbortSignal;
}
