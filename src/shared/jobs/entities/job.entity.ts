import { JobStatus } from '../enums/job-status.enum';

export interface Job {
  id: string;
  domain: string;
  urls: string[];
  status: JobStatus;
  createdAt: Date;
  updatedAt: Date;
}
