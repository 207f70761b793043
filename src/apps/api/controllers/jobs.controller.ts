import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Post,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiCreatedResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiServiceUnavailableResponse,
  ApiTags,
} from '@nestjs/swagger';
import { CreateJobDto } from '@/shared/jobs/dto/create-job.dto';
import {
  JobCreatedDto,
  JobResponseDto,
} from '@/shared/jobs/dto/job-response.dto';
import { JobMapper } from '@/shared/jobs/mappers/job.mapper';
import { JobAdmissionService } from '@/shared/jobs/services/job-admission.service';

@ApiTags('Jobs')
@Controller('jobs')
export class JobsController {
  private readonly logger = new Logger(JobsController.name);

  constructor(
    private readonly jobAdmission: JobAdmissionService,
    private readonly jobMapper: JobMapper,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Create a scrape job',
    description:
      'Records the job and dispatches it to the worker queue of its domain. Answers only once the dispatch is accepted.',
  })
  @ApiCreatedResponse({ description: 'Job accepted', type: JobCreatedDto })
  @ApiBadRequestResponse({ description: 'Invalid domain or URL list' })
  @ApiServiceUnavailableResponse({
    description: 'Job store or dispatch queue unavailable; nothing was kept',
  })
  async createJob(@Body() createJobDto: CreateJobDto): Promise<JobCreatedDto> {
    const jobId = await this.jobAdmission.createJob(createJobDto);
    return this.jobMapper.toCreatedDto(jobId);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a scrape job by id' })
  @ApiOkResponse({ type: JobResponseDto })
  @ApiBadRequestResponse({ description: 'Id is not a UUID' })
  @ApiNotFoundResponse({ description: 'Job not found' })
  @ApiServiceUnavailableResponse({ description: 'Job store unavailable' })
  async getJob(
    @Param('id', new ParseUUIDPipe()) id: string,
  ): Promise<JobResponseDto> {
    const job = await this.jobAdmission.getJob(id);

    if (!job) {
      this.logger.debug(`Job not found: ${id}`);
      throw new NotFoundException('Job not found');
    }

    return this.jobMapper.toDto(job);
  }
}
