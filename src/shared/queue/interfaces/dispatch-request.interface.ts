/**
 * Body the worker runtime receives: container arguments plus execution
 * limits.
 */
export interface WorkerRunRequest {
  overrides: {
    containerOverrides: Array<{ args: string[] }>;
    taskCount: number;
    timeout: string;
  };
}

export interface DispatchRequest {
  jobId: string;
  target: {
    method: 'POST';
    url: string;
    headers: Record<string, string>;
  };
  body: WorkerRunRequest;
  // Named execution identity; resolved to a credential by the queue runtime.
  identity: {
    serviceAccount: string;
  };
  createdAt: string;
}
