import { Injectable } from '@nestjs/common';
import { Job } from '../entities/job.entity';
import { JobCreatedDto, JobResponseDto } from '../dto/job-response.dto';

@Injectable()
export class JobMapper {
  toDto(job: Job): JobResponseDto {
    return {
      id: job.id,
      domain: job.domain,
      urls: [...job.urls],
      status: job.status,
      createdAt: job.createdAt.toISOString(),
      updatedAt: job.updatedAt.toISOString(),
    };
  }

  toCreatedDto(jobId: string): JobCreatedDto {
    return { jobId };
  }
}
