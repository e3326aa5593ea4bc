type ErrorContext = Readonly<Record<string, string | number | boolean>>;

export type CliErrorEnvelope = {
  event: 'import.failed';
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  issues?: string[];
  stack?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitized: Record<string, string | number | boolean> = {};
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw === 'string' || typeof raw === 'boolean' || (typeof raw === 'number' && Number.isFinite(raw))) {
      sanitized[key] = raw;
    }
  }

  return Object.keys(sanitized).length > 0 ? sanitized : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === '1' || debug === 'true';
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: 'import.failed',
    name: error.name || 'Error',
    message: error.message,
  };

  if (typeof errorRecord.code === 'string') {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (Array.isArray(errorRecord.issues)) {
    envelope.issues = errorRecord.issues.filter((issue): issue is string => typeof issue === 'string');
  }

  if (includeStack && typeof error.stack === 'string') {
    envelope.stack = error.stack;
  }

  return envelope;
};
