export class JobServiceError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class ConfigurationError extends JobServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'configuration_error', options);
  }
}

/**
 * Malformed or missing submission fields, or invalid pagination.
 * Raised synchronously; never enters the job state machine.
 */
export class InvalidRequestError extends JobServiceError {
  constructor(message: string, code = 'invalid_request', options?: ErrorOptions) {
    super(message, code, options);
  }
}

export class TracklistError extends InvalidRequestError {
  constructor(message: string, options?: ErrorOptions) {
    super(`invalid tracklist: ${message}`, 'invalid_tracklist', options);
  }
}

export class JobNotFoundError extends JobServiceError {
  readonly jobId: string;

  constructor(jobId: string) {
    super(`job not found: ${jobId}`, 'not_found');
    this.jobId = jobId;
  }
}

export class JobAlreadyTerminalError extends JobServiceError {
  readonly jobId: string;

  constructor(jobId: string, status: string) {
    super(`job ${jobId} already finished with status ${status}`, 'already_terminal');
    this.jobId = jobId;
  }
}

/** A completed job's artifact that is not listed or not present on disk. */
export class ArtifactNotFoundError extends JobServiceError {
  readonly jobId: string;

  constructor(jobId: string, message: string) {
    super(message, 'artifact_not_found');
    this.jobId = jobId;
  }
}

export class WorkerFaultError extends JobServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'worker_fault', options);
  }
}

export class ProtocolViolationError extends JobServiceError {
  constructor(message: string) {
    super(message, 'protocol_violation');
  }
}

export class SubscriberOverflowError extends JobServiceError {
  readonly jobId: string;

  constructor(jobId: string, capacity: number) {
    super(
      `progress subscriber for job ${jobId} fell behind by more than ${capacity} events`,
      'subscriber_overflow',
    );
    this.jobId = jobId;
  }
}
