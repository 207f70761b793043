export class QueueNotFoundError extends Error {
  constructor(readonly queueName: string) {
    super(`Queue ${queueName} does not exist`);
    this.name = 'QueueNotFoundError';
  }
}

export class QueueAlreadyExistsError extends Error {
  constructor(readonly queueName: string) {
    super(`Queue ${queueName} already exists`);
    this.name = 'QueueAlreadyExistsError';
  }
}

export class UnsupportedRetryPolicyError extends Error {
  constructor(
    readonly queueName: string,
    reason: string,
  ) {
    super(`Retry policy for queue ${queueName} cannot be honoured: ${reason}`);
    this.name = 'UnsupportedRetryPolicyError';
  }
}
