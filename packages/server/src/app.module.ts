import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { AuthModule } from './auth/auth.module.js';
import { CaseModule } from './cases/case.module.js';
import { ConfigModule } from './common/config.module.js';
import { GlobalExceptionFilter } from './common/global-exception.filter.js';
import { CourtModule } from './court/court.module.js';
import { GatewayModule } from './gateway/gateway.module.js';
import { HealthController } from './health.controller.js';

@Module({
	imports: [ConfigModule, GatewayModule, AuthModule, CourtModule, CaseModule],
	controllers: [HealthController],
	providers: [
		{
			provide: APP_FILTER,
			useClass: GlobalExceptionFilter,
		},
	],
})
export class AppModule {}
