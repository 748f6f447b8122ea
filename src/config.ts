/**
 * Export configuration. Command-line flags override AGENTIC_* environment
 * variables (loaded from .env by the CLI), which override the defaults.
 */
import path from 'node:path';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { ConfigError, errorMessage } from './models/errors.js';
import { OUTPUT_FORMATS, VIEW_NAMES } from './models/views.js';
import type { OutputFormat, ViewName } from './models/views.js';
import { DEFAULT_DEFINITIONS_DIR } from './services/source-definitions.js';
import type { LogLevel } from './utils/log.js';

export const DEFAULT_OUTPUT_DIR = 'data';

export interface ExportConfig {
  outputDir: string;
  definitionsDir: string;
  views: ViewName[];
  formats: OutputFormat[];
  logLevel: LogLevel;
}

export interface CliOptions {
  config: ExportConfig;
  help: boolean;
}

export const USAGE = `Usage: agentic-top10-export [options]

Options:
  --out <dir>            Output directory (env AGENTIC_OUTPUT_DIR, default "${DEFAULT_OUTPUT_DIR}")
  --views <list>         Comma-separated views: ${VIEW_NAMES.join(', ')} (env AGENTIC_VIEWS)
  --formats <list>       Comma-separated formats: ${OUTPUT_FORMATS.join(', ')} (env AGENTIC_FORMATS)
  --definitions <dir>    Source definitions directory (env AGENTIC_DEFINITIONS_DIR)
  --quiet                Only log errors
  -h, --help             Show this message
`;

// Selections come back in canonical order, whatever order they were given in.
function selection<T extends string>(allowed: readonly T[], label: string) {
  return z
    .string()
    .optional()
    .transform((raw, ctx): T[] => {
      if (raw === undefined || raw.trim() === '') return [...allowed];
      const requested = raw.split(',').map((part) => part.trim()).filter((part) => part.length > 0);
      const unknown = requested.filter((part) => !allowed.some((name) => name === part));
      if (unknown.length > 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `unknown ${label}: ${unknown.join(', ')} (expected ${allowed.join(', ')})`,
        });
        return z.NEVER;
      }
      return allowed.filter((name) => requested.includes(name));
    });
}

const configSchema = z.object({
  outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  definitionsDir: z.string().min(1).default(DEFAULT_DEFINITIONS_DIR),
  views: selection(VIEW_NAMES, 'view'),
  formats: selection(OUTPUT_FORMATS, 'format'),
  logLevel: z.enum(['debug', 'info', 'error']).default('info'),
});

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        out: { type: 'string' },
        views: { type: 'string' },
        formats: { type: 'string' },
        definitions: { type: 'string' },
        quiet: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err: unknown) {
    throw new ConfigError(errorMessage(err));
  }
}

export function loadConfig(argv: readonly string[], env: NodeJS.ProcessEnv): CliOptions {
  const values = parseFlags(argv);

  const parsed = configSchema.safeParse({
    outputDir: values.out ?? nonEmpty(env.AGENTIC_OUTPUT_DIR),
    definitionsDir: values.definitions ?? nonEmpty(env.AGENTIC_DEFINITIONS_DIR),
    views: values.views ?? env.AGENTIC_VIEWS,
    formats: values.formats ?? env.AGENTIC_FORMATS,
    logLevel: values.quiet ? 'error' : nonEmpty(env.AGENTIC_LOG_LEVEL),
  });

  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }

  return {
    config: {
      ...parsed.data,
      outputDir: path.resolve(parsed.data.outputDir),
      definitionsDir: path.resolve(parsed.data.definitionsDir),
    },
    help: values.help === true,
  };
}
