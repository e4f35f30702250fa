export interface UpstreamRequest {
	/** Path relative to the upstream base URL, e.g. `stateWebService.php`. */
	readonly path: string;
	readonly query?: Record<string, string>;
	readonly headers?: Record<string, string>;
}

export interface UpstreamResponse {
	readonly status: number;
	readonly body: string;
}

/**
 * A network handle that lives for exactly one gateway operation. Sessions are
 * never pooled or handed to a second operation.
 */
export interface IUpstreamSession {
	readonly id: string;

	get(request: UpstreamRequest, signal: AbortSignal): Promise<UpstreamResponse>;

	close(): Promise<void>;
}

export interface ISessionFactory {
	open(): IUpstreamSession;
}
