export type { IEnvelopeCodec } from './envelope-codec.interface.js';
export type {
	ISessionFactory,
	IUpstreamSession,
	UpstreamRequest,
	UpstreamResponse,
} from './upstream-session.interface.js';
