import { z } from 'zod';

/**
 * Variables without which the service refuses to start.
 *
 * Order matters: the first absent one is the one reported.
 */
export const REQUIRED_ENV = [
  'TABLEAU_USERNAME',
  'TABLEAU_PAT_NAME',
  'TABLEAU_PAT_SECRET',
  'TABLEAU_CA_CLIENT',
  'TABLEAU_CA_SECRET_ID',
  'TABLEAU_CA_SECRET_VALUE',
  'TABLEAU_SITENAME',
  'TABLEAU_SERVER',
  'TWILIO_ACCOUNT_SID',
  'TWILIO_AUTH_TOKEN',
  'TWILIO_FROM_NUMBER',
  'TWILIO_TO_NUMBER',
  'WHATSAPP_FROM',
  'WHATSAPP_TO',
] as const;

export type RequiredEnvName = (typeof REQUIRED_ENV)[number];

export class ConfigError extends Error {
  constructor(
    readonly variable: string,
    message: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  TABLEAU_SERVER: z.string().url(),
  TABLEAU_API_VERSION: z.string().regex(/^\d+\.\d+$/).default('3.21'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  AUDIT_LOG_PATH: z.string().min(1).default('log.txt'),
  WEBHOOK_SECRET: z.string().min(1).optional(),
});

export interface AppConfig {
  readonly server: {
    readonly host: string;
    readonly port: number;
    readonly logLevel: (typeof LOG_LEVELS)[number];
  };
  readonly tableau: {
    readonly serverUrl: string;
    readonly apiVersion: string;
    readonly siteName: string;
    readonly username: string;
    readonly personalAccessToken: {
      readonly name: string;
      readonly secret: string;
    };
    readonly connectedApp: {
      readonly clientId: string;
      readonly secretId: string;
      readonly secretValue: string;
    };
  };
  readonly twilio: {
    readonly accountSid: string;
    readonly authToken: string;
    readonly sms: { readonly from: string; readonly to: string };
    readonly whatsapp: { readonly from: string; readonly to: string };
  };
  readonly auditLogPath: string;
  /** Shared secret inbound webhooks must present. Unset means open endpoints. */
  readonly webhookSecret: string | undefined;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object') deepFreeze(child);
  }
  return Object.freeze(value);
}

/**
 * Builds the immutable application config from an environment map.
 *
 * Presence of every required variable is checked first, in declaration
 * order, so the error names the first one missing. Empty strings count
 * as missing. Shape errors (bad URL, bad port) name the offending key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  for (const name of REQUIRED_ENV) {
    const value = env[name];
    if (value === undefined || value.trim() === '') {
      throw new ConfigError(
        name,
        `Environment variable ${name} is not available, server shutting down...`,
      );
    }
  }

  const required = (name: RequiredEnvName): string => env[name] ?? '';

  // Empty optional values fall back to their defaults
  const optional = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = envSchema.safeParse(optional);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? String(issue.path[0]) : 'unknown';
    throw new ConfigError(
      variable,
      `Environment variable ${variable} is invalid: ${issue?.message ?? 'unknown error'}`,
    );
  }

  const opts = parsed.data;

  return deepFreeze({
    server: {
      host: opts.HOST,
      port: opts.PORT,
      logLevel: opts.LOG_LEVEL,
    },
    tableau: {
      serverUrl: opts.TABLEAU_SERVER.replace(/\/+$/, ''),
      apiVersion: opts.TABLEAU_API_VERSION,
      siteName: required('TABLEAU_SITENAME'),
      username: required('TABLEAU_USERNAME'),
      personalAccessToken: {
        name: required('TABLEAU_PAT_NAME'),
        secret: required('TABLEAU_PAT_SECRET'),
      },
      connectedApp: {
        clientId: required('TABLEAU_CA_CLIENT'),
        secretId: required('TABLEAU_CA_SECRET_ID'),
        secretValue: required('TABLEAU_CA_SECRET_VALUE'),
      },
    },
    twilio: {
      accountSid: required('TWILIO_ACCOUNT_SID'),
      authToken: required('TWILIO_AUTH_TOKEN'),
      sms: { from: required('TWILIO_FROM_NUMBER'), to: required('TWILIO_TO_NUMBER') },
      whatsapp: { from: required('WHATSAPP_FROM'), to: required('WHATSAPP_TO') },
    },
    auditLogPath: opts.AUDIT_LOG_PATH,
    webhookSecret: opts.WEBHOOK_SECRET,
  });
}
