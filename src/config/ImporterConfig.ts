import { z } from 'zod';
import { ConfigurationError } from '../domain/errors/Zip2SqliteError.js';
import { DEFAULT_INITIAL_EXPONENT, MAX_INITIAL_EXPONENT } from '../domain/services/AdaptiveTransferSession.js';
import { compileNameFilter } from '../domain/services/memberSelection.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const isCompilableFilter = (pattern: string): boolean => {
  try {
    compileNameFilter(pattern);
    return true;
  } catch {
    return false;
  }
};

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const importerConfigSchema = z.object({
  archivePath: optionalText,
  databasePath: optionalText,
  nameFilter: optionalText.refine((value) => value === undefined || isCompilableFilter(value), {
    message: 'must be a valid regular expression',
  }),
  maxRows: z.coerce.number().int().min(0).default(0),
  loaderBinary: z.string().trim().min(1).default('sqlite3'),
  initialExponent: z.coerce.number().int().min(1).max(MAX_INITIAL_EXPONENT).default(DEFAULT_INITIAL_EXPONENT),
  continueOnError: z.boolean().default(true),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

/** Raw options as they arrive from the CLI, the environment or a caller. */
export interface ImporterConfigInput {
  readonly archivePath?: string;
  readonly databasePath?: string;
  readonly nameFilter?: string;
  readonly maxRows?: number | string;
  readonly loaderBinary?: string;
  readonly initialExponent?: number | string;
  readonly continueOnError?: boolean;
  readonly logLevel?: string;
}

export interface ImporterConfig {
  readonly archivePath?: string;
  readonly databasePath?: string;
  /** Compiled from the user's pattern; matched at the start of member paths. */
  readonly nameFilter?: RegExp;
  readonly maxRows: number;
  readonly loaderBinary: string;
  readonly initialExponent: number;
  readonly continueOnError: boolean;
  readonly logLevel: LogLevel;
}

/** Validate and default a configuration; every problem is reported at once. */
export const resolveImporterConfig = (input: ImporterConfigInput = {}): ImporterConfig => {
  const parsed = importerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    );
  }

  const { nameFilter, ...rest } = parsed.data;
  return {
    ...rest,
    nameFilter: nameFilter === undefined ? undefined : compileNameFilter(nameFilter),
  };
};
