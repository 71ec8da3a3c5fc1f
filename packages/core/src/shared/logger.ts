import pino from 'pino';

const redactPaths = [
  'accountCode',
  'account_code',
  '*.accountCode',
  '*.account_code',
];

export type Logger = pino.Logger;

export function createLogger(name: string, options?: { destination?: pino.DestinationStream; level?: string }): pino.Logger {
  return pino({
    name,
    level: options?.level ?? process.env.LOG_LEVEL ?? 'info',
    redact: {
      paths: redactPaths,
      censor: '[REDACTED]',
    },
  }, options?.destination);
}

/**
 * Render a host/port pair for log lines and error messages.
 */
export function describeEndpoint(host: string, port: number): string {
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}
