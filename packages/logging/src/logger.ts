import type {Writable} from 'node:stream';

import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {sanitizeForLog} from './redaction';
import {LogEventSchema, type LogEvent} from './schema';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

type EmittableLogLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_SEVERITY = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
} as const satisfies Record<LogLevel, number>;

/** What call sites pass; the envelope fields are filled in by the logger. */
export const LogEventInputSchema = LogEventSchema.omit({ts: true, service: true, env: true, metadata: true})
  .partial({correlation_id: true, request_id: true})
  .extend({
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

export type StructuredLogWriter = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

type LevelMethod = (input: Omit<LogEventInput, 'level'>) => void;

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: LevelMethod;
  info: LevelMethod;
  warn: LevelMethod;
  error: LevelMethod;
  fatal: LevelMethod;
};

const CONTEXT_FIELDS = ['workload_ip', 'role', 'route', 'method'] as const;

const inheritContext = (input: LogEventInput, context: LogContext | undefined) => {
  const inherited: Partial<Record<(typeof CONTEXT_FIELDS)[number], string>> = {};
  for (const field of CONTEXT_FIELDS) {
    const value = input[field] ?? context?.[field];
    if (value) {
      inherited[field] = value;
    }
  }

  return inherited;
};

/**
 * Writes one JSON object per line. Events below the configured level are skipped,
 * `error` and `fatal` go to stderr and the rest to stdout. Request context from
 * {@link runWithLogContext} is merged into every event.
 */
class JsonLinesLogger {
  private readonly threshold: number;
  private readonly now: () => Date;
  private readonly writer: StructuredLogWriter;
  private readonly extraSensitiveKeys: string[];

  public constructor(private readonly options: StructuredLoggerOptions) {
    this.threshold = LEVEL_SEVERITY[LogLevelSchema.parse(options.level)];
    this.now = options.now ?? (() => new Date());
    this.writer = options.writer ?? {stdout: process.stdout, stderr: process.stderr};
    this.extraSensitiveKeys = options.extraSensitiveKeys ?? [];
  }

  public emit(rawInput: LogEventInput): void {
    const parsed = LogEventInputSchema.safeParse(rawInput);
    if (!parsed.success || LEVEL_SEVERITY[parsed.data.level] < this.threshold) {
      return;
    }

    try {
      const envelope = this.buildEnvelope(parsed.data, getLogContext());
      this.streamFor(envelope.level).write(`${JSON.stringify(envelope)}\n`);
    } catch {
      // Logging failures must never break request handling.
    }
  }

  private buildEnvelope(input: LogEventInput, context: LogContext | undefined): LogEvent {
    const {metadata, correlation_id, request_id, ...fields} = input;
    const sanitized = sanitizeForLog({value: metadata ?? {}, extraSensitiveKeys: this.extraSensitiveKeys});

    return LogEventSchema.parse({
      ...fields,
      ...inheritContext(input, context),
      ts: this.now().toISOString(),
      service: this.options.service,
      env: this.options.env,
      correlation_id: correlation_id ?? context?.correlation_id ?? 'n/a',
      request_id: request_id ?? context?.request_id ?? 'n/a',
      metadata: typeof sanitized === 'object' && sanitized !== null ? sanitized : {}
    });
  }

  private streamFor(level: EmittableLogLevel) {
    return level === 'error' || level === 'fatal' ? this.writer.stderr : this.writer.stdout;
  }
}

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const logger = new JsonLinesLogger({
    ...options,
    service: z.string().min(1).parse(options.service),
    env: z.string().min(1).parse(options.env)
  });
  const at =
    (level: EmittableLogLevel): LevelMethod =>
    input =>
      logger.emit({...input, level});

  return {
    log: input => logger.emit(input),
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
    fatal: at('fatal')
  };
};

export const createNoopLogger = (): StructuredLogger => ({
  log: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined
});
