export type MailErrorCode =
  | 'ATTACHMENT_NOT_FOUND'
  | 'NO_RECIPIENTS'
  | 'SEND_FAILED'
  | 'INVALID_HEADER';

/**
 * Base class for every failure raised while building or sending a message.
 */
export class MailError extends Error {
  readonly code: MailErrorCode;

  constructor(code: MailErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class AttachmentNotFoundError extends MailError {
  constructor(readonly path: string) {
    super('ATTACHMENT_NOT_FOUND', `Attached file doesn't exist: ${path}`);
  }
}

export class NoRecipientsError extends MailError {
  constructor() {
    super(
      'NO_RECIPIENTS',
      'You must add at least one recipient to mail message!',
    );
  }
}

export class SendFailedError extends MailError {
  constructor(reason?: string, options?: ErrorOptions) {
    super(
      'SEND_FAILED',
      reason ? `Send failed: ${reason}` : 'Send failed!',
      options,
    );
  }
}

/**
 * Raised when a value would break out of its header line (CR/LF, list separators).
 */
export class InvalidHeaderError extends MailError {
  constructor(
    readonly field: string,
    reason: string,
  ) {
    super('INVALID_HEADER', `Invalid ${field}: ${reason}`);
  }
}

export function isMailError(error: unknown): error is MailError {
  return error instanceof MailError;
}
