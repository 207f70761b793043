import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { loadEnv } from '@/shared/config/load-env';
import { validationSchema } from '@/shared/config/env.validation';
import { JobsModule } from '@/shared/jobs/jobs.module';
import { HealthController } from './controllers/health.controller';
import { JobsController } from './controllers/jobs.controller';

loadEnv();

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema,
      ignoreEnvFile: true,
    }),
    JobsModule,
  ],
  controllers: [JobsController, HealthController],
})
export class ApiAppModule {}
