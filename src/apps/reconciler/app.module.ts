import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { loadEnv } from '@/shared/config/load-env';
import { validationSchema } from '@/shared/config/env.validation';
import { JobsModule } from '@/shared/jobs/jobs.module';
import { JobReconcilerService } from './services/job-reconciler.service';

loadEnv();

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema,
      ignoreEnvFile: true,
    }),
    ScheduleModule.forRoot(),
    JobsModule,
  ],
  providers: [JobReconcilerService],
})
export class ReconcilerAppModule {}
