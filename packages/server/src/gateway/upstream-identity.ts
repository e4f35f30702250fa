/** How this gateway presents itself to upstream, as the mobile app would. */
export interface UpstreamIdentity {
	readonly deviceId: string;
	readonly appId: string;
	readonly appVersion: string;
}

export function uidOf(identity: UpstreamIdentity): string {
	return `${identity.deviceId}:${identity.appId}`;
}

export const LANGUAGE_FLAGS = {
	language_flag: 'english',
	bilingual_flag: '0',
} as const;
