export type TransportKind = 'sendmail' | 'smtp' | 'stream';

const TRANSPORT_KINDS: readonly TransportKind[] = ['sendmail', 'smtp', 'stream'];

export interface SmtpConfig {
  host: string;
  port: number;
  secure: boolean;
  auth?: {
    user: string;
    pass: string;
  };
}

/**
 * Transport configuration resolved from environment variables
 */
export type TransportConfig = {
  /** Envelope sender used for every message when set */
  defaultSender?: string;
} & (
  | { kind: 'sendmail'; sendmailPath: string }
  | { kind: 'smtp'; smtp: SmtpConfig }
  | { kind: 'stream' }
);

function isTransportKind(value: string): value is TransportKind {
  return TRANSPORT_KINDS.some((kind) => kind === value);
}

function read(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Validate and load transport settings.
 * Fails fast, reporting every problem at once.
 *
 * - `MAIL_TRANSPORT`: `sendmail` (default), `smtp` or `stream`
 * - `SENDMAIL_PATH`: sendmail binary (default `sendmail`)
 * - `SMTP_HOST`, `SMTP_PORT` (default 587), `SMTP_SECURE`, `SMTP_USER`, `SMTP_PASS`
 * - `MAIL_DEFAULT_SENDER`: envelope sender
 */
export function loadTransportConfig(
  env: NodeJS.ProcessEnv = process.env,
): TransportConfig {
  const errors: string[] = [];
  const kind = read(env, 'MAIL_TRANSPORT') ?? 'sendmail';
  const defaultSender = read(env, 'MAIL_DEFAULT_SENDER');

  let config: TransportConfig | undefined;

  if (!isTransportKind(kind)) {
    errors.push(
      `MAIL_TRANSPORT must be one of ${TRANSPORT_KINDS.join(', ')} (got "${kind}")`,
    );
  } else if (kind === 'sendmail') {
    config = {
      kind,
      sendmailPath: read(env, 'SENDMAIL_PATH') ?? 'sendmail',
      defaultSender,
    };
  } else if (kind === 'stream') {
    config = { kind, defaultSender };
  } else {
    const host = read(env, 'SMTP_HOST');
    const rawPort = read(env, 'SMTP_PORT') ?? '587';
    const port = Number(rawPort);
    const user = read(env, 'SMTP_USER');
    const pass = read(env, 'SMTP_PASS');

    if (!host) {
      errors.push('SMTP_HOST is required but not set');
    }
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      errors.push(`SMTP_PORT must be a port number (got "${rawPort}")`);
    }
    if ((user === undefined) !== (pass === undefined)) {
      errors.push('SMTP_USER and SMTP_PASS must be set together');
    }

    if (host) {
      config = {
        kind,
        smtp: {
          host,
          port,
          secure: read(env, 'SMTP_SECURE') === 'true',
          auth: user && pass ? { user, pass } : undefined,
        },
        defaultSender,
      };
    }
  }

  if (errors.length > 0 || !config) {
    for (const error of errors) {
      console.error(`[Config Error] ${error}`);
    }
    throw new Error(`Invalid mail transport configuration: ${errors.join('; ')}`);
  }

  return config;
}
