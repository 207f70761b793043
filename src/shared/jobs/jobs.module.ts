import { Module } from '@nestjs/common';
import { DatabaseModule } from '@/shared/database/database.module';
import { QueueModule } from '@/shared/queue/queue.module';
import { JOB_RECORD_STORE } from './interfaces/job-record-store.interface';
import { JobMapper } from './mappers/job.mapper';
import { JobRepository } from './repositories/job.repository';
import { JobAdmissionService } from './services/job-admission.service';

@Module({
  imports: [DatabaseModule, QueueModule],
  providers: [
    JobRepository,
    { provide: JOB_RECORD_STORE, useExisting: JobRepository },
    JobAdmissionService,
    JobMapper,
  ],
  exports: [JOB_RECORD_STORE, JobAdmissionService, JobMapper, QueueModule],
})
export class JobsModule {}
