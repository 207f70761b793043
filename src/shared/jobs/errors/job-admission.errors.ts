/**
 * Failures surfaced by job admission. Each keeps the underlying cause for
 * logging; none of them carries details of the failing dependency into its
 * message.
 */
export abstract class JobAdmissionError extends Error {
  constructor(
    message: string,
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed request; raised before anything is written. */
export class ValidationError extends JobAdmissionError {
  constructor(readonly details: string[]) {
    super(`Invalid job request: ${details.join('; ')}`);
  }
}

/** The record store was unreachable or rejected the operation. */
export class PersistenceError extends JobAdmissionError {}

/** Queue provisioning or dispatch submission failed. */
export class DispatchError extends JobAdmissionError {}
