import { parseArgs } from 'node:util';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_SHUTDOWN_GRACE_MS = 5000;

export interface ListenAddress {
  host: string;
  port: number;
}

export interface TlsPaths {
  certPath: string;
  keyPath: string;
}

export interface ServerConfig {
  readonly listenAddress: string;
  readonly listen: Readonly<ListenAddress>;
  /** Present only when both cert and key paths were supplied. */
  readonly tls?: Readonly<TlsPaths>;
  readonly endpoint: string;
  readonly minCount: number;
  readonly maxCount: number;
  /** Empty string disables auth. */
  readonly authToken: string;
  /** 0 disables fault injection. */
  readonly failProb: number;
  readonly shutdownGraceMs: number;
  readonly logLevel: LogLevel;
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

/** Parse `[host]:port`; an empty host listens on every interface. */
export function parseListenAddress(addr: string): ListenAddress | undefined {
  const m = /^(?:\[([^\]]+)\]|([^:[\]]*)):(\d{1,5})$/.exec(addr.trim());
  if (!m) return undefined;
  const port = Number(m[3]);
  if (port > 65535) return undefined;
  const host = m[1] ?? m[2] ?? '';
  return { host: host || '0.0.0.0', port };
}

const numeric = (name: string) => z.preprocess(
  (v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
  z.number({ invalid_type_error: `${name} must be a number` }),
);

const RawConfigSchema = z.object({
  listenAddress: z.string().default(':8080'),
  tlsCert: z.string().default(''),
  tlsKey: z.string().default(''),
  endpoint: z.string().default('/metrics'),
  minCount: numeric('metrics-min-count').pipe(z.number().int().min(0)).default(0),
  maxCount: numeric('metrics-max-count').pipe(z.number().int().min(0)).default(10),
  authToken: z.string().default(''),
  failProb: numeric('with-random-error-prob').pipe(z.number().finite()).default(0),
  shutdownGraceMs: numeric('shutdown-grace-ms').pipe(z.number().int().min(0)).default(DEFAULT_SHUTDOWN_GRACE_MS),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export const ServerConfigSchema = RawConfigSchema.superRefine((c, ctx) => {
  if (c.minCount > c.maxCount) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['minCount'], message: 'invalid metrics count params: min-count > max-count' });
  }
  if (c.failProb < 0 || c.failProb > 1) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['failProb'], message: 'random error probability must be in the [0, 1] range' });
  }
  if (!c.endpoint.startsWith('/')) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['endpoint'], message: 'metrics endpoint must start with "/"' });
  }
  if (!parseListenAddress(c.listenAddress)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['listenAddress'], message: `invalid listen address "${c.listenAddress}"` });
  }
});

/** Unvalidated settings, as strings from argv/env or already-typed values. */
export type RawConfig = { [K in keyof z.input<typeof RawConfigSchema>]?: unknown };

export function buildConfig(raw: RawConfig): ServerConfig {
  const res = ServerConfigSchema.safeParse(raw);
  if (!res.success) {
    throw new ConfigError(res.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)));
  }
  const c = res.data;
  const listen = parseListenAddress(c.listenAddress);
  if (!listen) throw new ConfigError([`listenAddress: invalid listen address "${c.listenAddress}"`]);
  const tls = c.tlsCert && c.tlsKey ? Object.freeze({ certPath: c.tlsCert, keyPath: c.tlsKey }) : undefined;
  return Object.freeze({
    listenAddress: c.listenAddress,
    listen: Object.freeze(listen),
    tls,
    endpoint: c.endpoint,
    minCount: c.minCount,
    maxCount: c.maxCount,
    authToken: c.authToken,
    failProb: c.failProb,
    shutdownGraceMs: c.shutdownGraceMs,
    logLevel: c.logLevel,
  });
}

export const USAGE = `Usage: mock-metrics [options]

A minimal test server that simulates a poll-able metrics stream.

Options:
  --listen-address <addr>          address to listen for incoming API connections (default ":8080")
  --listen-tls-cert <path>         TLS certificate file (TLS is enabled when cert and key are both set)
  --listen-tls-key <path>          TLS private key file
  --metrics-endpoint <path>        endpoint for serving metrics requests (default "/metrics")
  --metrics-min-count <n>          minimum number of metrics to return in responses (default 0)
  --metrics-max-count <n>          maximum number of metrics to return in responses (default 10)
  --with-auth-token <token>        require clients to provide this basic auth username
  --with-random-error-prob <p>     inject 500 errors with probability p in [0, 1] (default 0)
  --shutdown-grace-ms <ms>         time allowed for in-flight requests on shutdown (default 5000)
  --log-level <level>              ${LOG_LEVELS.join(' | ')} (default "info")
  -h, --help                       show this help
`;

// flag name -> [config key, env var]
const FLAGS = {
  'listen-address': ['listenAddress', 'LISTEN_ADDRESS'],
  'listen-tls-cert': ['tlsCert', 'LISTEN_TLS_CERT'],
  'listen-tls-key': ['tlsKey', 'LISTEN_TLS_KEY'],
  'metrics-endpoint': ['endpoint', 'METRICS_ENDPOINT'],
  'metrics-min-count': ['minCount', 'METRICS_MIN_COUNT'],
  'metrics-max-count': ['maxCount', 'METRICS_MAX_COUNT'],
  'with-auth-token': ['authToken', 'AUTH_TOKEN'],
  'with-random-error-prob': ['failProb', 'RANDOM_ERROR_PROB'],
  'shutdown-grace-ms': ['shutdownGraceMs', 'SHUTDOWN_GRACE_MS'],
  'log-level': ['logLevel', 'LOG_LEVEL'],
} as const satisfies Record<string, readonly [keyof RawConfig, string]>;

type FlagName = keyof typeof FLAGS;

export type CliParseResult =
  | { kind: 'help' }
  | { kind: 'config'; config: ServerConfig };

/**
 * Flags win over environment variables, which win over defaults.
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): CliParseResult {
  let values: Partial<Record<FlagName | 'help', string | boolean | undefined>>;
  try {
    const parsed = parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        help: { type: 'boolean', short: 'h' },
        'listen-address': { type: 'string' },
        'listen-tls-cert': { type: 'string' },
        'listen-tls-key': { type: 'string' },
        'metrics-endpoint': { type: 'string' },
        'metrics-min-count': { type: 'string' },
        'metrics-max-count': { type: 'string' },
        'with-auth-token': { type: 'string' },
        'with-random-error-prob': { type: 'string' },
        'shutdown-grace-ms': { type: 'string' },
        'log-level': { type: 'string' },
      },
    });
    values = parsed.values;
  } catch (err) {
    throw new ConfigError([err instanceof Error ? err.message : String(err)]);
  }
  if (values.help === true) return { kind: 'help' };

  const raw: RawConfig = {};
  for (const name of Object.keys(FLAGS) as FlagName[]) {
    const [key, envName] = FLAGS[name];
    const fromFlag = values[name];
    const fromEnv = env[envName];
    if (typeof fromFlag === 'string') raw[key] = fromFlag;
    else if (fromEnv !== undefined && fromEnv !== '') raw[key] = fromEnv;
  }
  return { kind: 'config', config: buildConfig(raw) };
}
