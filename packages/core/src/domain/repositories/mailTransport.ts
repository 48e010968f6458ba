/**
 * A fully compiled message, ready to hand to a mail agent.
 */
export interface TransportMessage {
  /** Comma-joined rendered `To` addresses */
  recipients: string;
  subject: string;
  body: string;
  /** Header lines joined with CRLF, empty when there are none */
  headers: string;
}

/**
 * Transport interface for delivering compiled messages.
 *
 * This interface abstracts the delivery mechanism (local sendmail, SMTP relay,
 * in-memory capture, etc.) so message compilation stays independent of
 * infrastructure details.
 */
export interface MailTransport {
  /**
   * Deliver a compiled message.
   *
   * @returns `true` when the mail agent accepted the message
   *
   * @example
   * ```typescript
   * const accepted = await transport.send({
   *   recipients: '"Jane" <jane@example.com>',
   *   subject: 'Hello',
   *   body: 'Hello, world!',
   *   headers: 'From: sender@example.com',
   * });
   * ```
   */
  send(message: TransportMessage): Promise<boolean>;
}
