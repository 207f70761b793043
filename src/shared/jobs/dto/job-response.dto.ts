import { ApiProperty } from '@nestjs/swagger';
import { JobStatus } from '../enums/job-status.enum';

export class JobResponseDto {
  @ApiProperty({
    description: 'Job identifier',
    example: '123e4567-e89b-42d3-a456-426614174000',
    format: 'uuid',
  })
  id!: string;

  @ApiProperty({ description: 'Domain the URLs belong to', example: 'shop.example' })
  domain!: string;

  @ApiProperty({
    description: 'URLs to scrape, in request order',
    example: ['https://shop.example/products/1'],
    type: [String],
  })
  urls!: string[];

  @ApiProperty({
    description: 'Set to QUEUED on creation; later values come from the worker',
    enum: JobStatus,
    example: JobStatus.QUEUED,
  })
  status!: JobStatus;

  @ApiProperty({ example: '2026-03-01T10:00:00.000Z', format: 'date-time' })
  createdAt!: string;

  @ApiProperty({ example: '2026-03-01T10:05:00.000Z', format: 'date-time' })
  updatedAt!: string;
}

export class JobCreatedDto {
  @ApiProperty({
    description: 'Identifier of the accepted job',
    example: '123e4567-e89b-42d3-a456-426614174000',
    format: 'uuid',
  })
  jobId!: string;
}
