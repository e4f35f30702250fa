/** Pull the caller's upstream token out of an `Authorization: Bearer <token>` header. */
export function extractBearerToken(header: string | undefined): string | undefined {
	const match = /^Bearer\s+(\S.*)$/i.exec(header?.trim() ?? '');
	return match?.[1];
}
