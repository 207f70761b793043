import { Module } from '@nestjs/common';
import { QUEUE_SERVICE } from './interfaces/queue-service.interface';
import {
  queueConnectionProvider,
  queueRegistryClientProvider,
} from './queue.providers';
import { BullQueueService } from './services/bull-queue.service';
import { DispatchSubmitterService } from './services/dispatch-submitter.service';
import { QueueProvisionerService } from './services/queue-provisioner.service';

@Module({
  providers: [
    queueRegistryClientProvider,
    queueConnectionProvider,
    BullQueueService,
    { provide: QUEUE_SERVICE, useExisting: BullQueueService },
    QueueProvisionerService,
    DispatchSubmitterService,
  ],
  exports: [QUEUE_SERVICE, QueueProvisionerService, DispatchSubmitterService],
})
export class QueueModule {}
