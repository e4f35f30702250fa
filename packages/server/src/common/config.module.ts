import { Global, Logger, Module } from '@nestjs/common';
import { APP_CONFIG, parseConfig } from './config.js';

@Global()
@Module({
	providers: [
		{
			provide: APP_CONFIG,
			useFactory: () => {
				let config: ReturnType<typeof parseConfig>;
				try {
					config = parseConfig();
				} catch (error) {
					throw new Error(
						`Invalid environment configuration: ${error instanceof Error ? error.message : String(error)}`,
					);
				}
				new Logger('ConfigModule').log(
					`Upstream ${new URL(config.UPSTREAM_BASE_URL).host}, deadline ${config.UPSTREAM_TIMEOUT_MS}ms`,
				);
				return config;
			},
		},
	],
	exports: [APP_CONFIG],
})
export class ConfigModule {}
