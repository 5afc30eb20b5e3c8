import { ConfigurationError } from './errors';

export interface ReportConfig {
  /** MAILBOX_API_URL */
  apiUrl?: string;
  /** MAILBOX_API_TOKEN */
  apiToken?: string;
  /** MAILBOX_REPORT_CONCURRENCY (default 4) */
  concurrency: number;
  /** SMTP_PORT */
  smtpPort?: number;
}

export function parsePositiveInt(name: string, value: string): number {
  const trimmed = value.trim();
  const num = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(num) || num < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${value}"`);
  }
  return num;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

/**
 * Read settings from the environment. Command-line flags override these.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ReportConfig {
  const concurrency = nonEmpty(env.MAILBOX_REPORT_CONCURRENCY);
  const smtpPort = nonEmpty(env.SMTP_PORT);

  return {
    apiUrl: nonEmpty(env.MAILBOX_API_URL),
    apiToken: nonEmpty(env.MAILBOX_API_TOKEN),
    concurrency: concurrency ? parsePositiveInt('MAILBOX_REPORT_CONCURRENCY', concurrency) : 4,
    smtpPort: smtpPort ? parsePositiveInt('SMTP_PORT', smtpPort) : undefined,
  };
}
