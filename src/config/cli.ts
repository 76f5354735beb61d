import { parseArgs } from 'node:util';
import { z } from 'zod';

export const WEBDRIVERS = ['chrome', 'firefox', 'edge', 'safari'] as const;
export type WebDriverName = (typeof WEBDRIVERS)[number];

export const TRANSLATORS = ['google', 'deepl'] as const;
export type TranslatorName = (typeof TRANSLATORS)[number];

export const USAGE = `Usage: menu-enricher --menus <dir> --webdriver <${WEBDRIVERS.join('|')}> --webdriver-path <path> --gapps <credentials.json> [--log <file>] [--translator <${TRANSLATORS.join('|')}>]

  --menus           Directory containing the menu JSON files
  --webdriver       Browser driver to automate
  --webdriver-path  Path to the driver executable
  --gapps           Path to the Google application credentials JSON
  --log             Also write logs to this file
  --translator      Translation backend (default: google)
  --help            Show this message`;

const cliSchema = z
  .object({
    menus: z.string().min(1),
    webdriver: z
      .string()
      .transform((v) => v.toLowerCase())
      .pipe(z.enum(WEBDRIVERS)),
    'webdriver-path': z.string().min(1),
    gapps: z.string().min(1).optional(),
    log: z.string().min(1).optional(),
    translator: z.enum(TRANSLATORS).default('google'),
  })
  .refine((args) => args.translator !== 'google' || args.gapps !== undefined, {
    message: 'Required with the google translator',
    path: ['gapps'],
  })
  .transform((args) => ({
    menus: args.menus,
    webdriver: args.webdriver,
    webdriverPath: args['webdriver-path'],
    gapps: args.gapps,
    log: args.log,
    translator: args.translator,
  }));

export type CliOptions = z.output<typeof cliSchema>;

export type ParsedCli = { kind: 'help' } | { kind: 'run'; options: CliOptions };

export class CliUsageError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid arguments: ${issues.join('; ')}`);
    this.name = 'CliUsageError';
  }
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        menus: { type: 'string' },
        webdriver: { type: 'string' },
        'webdriver-path': { type: 'string' },
        gapps: { type: 'string' },
        log: { type: 'string' },
        translator: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error: unknown) {
    throw new CliUsageError([error instanceof Error ? error.message : String(error)]);
  }
}

export function parseCli(argv: string[]): ParsedCli {
  const { help, ...args } = readArgs(argv);
  if (help) return { kind: 'help' };

  const result = cliSchema.safeParse(args);
  if (!result.success) {
    throw new CliUsageError(
      result.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return { kind: 'run', options: result.data };
}
