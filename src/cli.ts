#!/usr/bin/env node
/**
 * cli.ts — Command-line entry point.
 *
 *   channel-scraper scrape --url https://www.youtube.com/@handle
 *   channel-scraper scrape --input channels.txt --output run1 --output-dir out
 *   channel-scraper import-cookies cookies.json
 *   channel-scraper balance
 *
 * Configuration comes from the environment (and `.env`); command-line
 * options override it.  Exit codes: 0 done, 1 fatal error or nothing to do,
 * 130 interrupted.
 */

import { Command } from 'commander';
import { config as loadDotEnv } from 'dotenv';
import { z } from 'zod';
import { ChallengeSolver, SessionStore, createAxiosTransport, importCookies } from './agents';
import { BatchRunner } from './batchRunner';
import { BrowserManager } from './core/browserManager';
import { getErrorMessage } from './core/errors';
import { Logger, setLogLevel } from './core/logger';
import { loadScraperConfig, type ScraperConfig } from './core/types';
import { ProfileFetcher } from './profileFetcher';
import { DataExporter } from './services/dataExporter';
import { loadTargets, normalizeTarget } from './services/targetList';

const logger = new Logger('CLI');

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_INTERRUPTED = 130;

// ─── Option schemas ─────────────────────────────────────────

const scrapeOptionsSchema = z.object({
  url: z.string().optional(),
  input: z.string().optional(),
  output: z.string().optional(),
  outputDir: z.string().default('.'),
  overwrite: z.boolean().default(false),
  headless: z.boolean().optional(),
  session: z.boolean().default(true),
  debug: z.boolean().default(false),
});

type ScrapeOptions = z.infer<typeof scrapeOptionsSchema>;

const importOptionsSchema = z.object({
  sessionFile: z.string().optional(),
});

// ─── Interrupts ─────────────────────────────────────────────

interface InterruptHandle {
  signal: AbortSignal;
  dispose: () => void;
}

/**
 * First SIGINT/SIGTERM: finish the current channel, then stop.
 * Second: exit immediately.
 */
function setupInterruptHandling(): InterruptHandle {
  const controller = new AbortController();
  let count = 0;

  const onSignal = (signal: NodeJS.Signals) => {
    count += 1;
    if (count === 1) {
      logger.warn(`${signal} received, finishing the current channel before stopping…`);
      controller.abort(new Error(`Interrupted by ${signal}`));
      return;
    }
    logger.error('Force exit requested.');
    process.exit(EXIT_INTERRUPTED);
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    },
  };
}

// ─── Commands ───────────────────────────────────────────────

async function resolveTargets(opts: ScrapeOptions): Promise<string[]> {
  if (opts.url) return [normalizeTarget(opts.url)];
  if (opts.input) return loadTargets(opts.input);
  return [];
}

async function runScrape(opts: ScrapeOptions, env: ScraperConfig): Promise<number> {
  const config: ScraperConfig = {
    ...env,
    headless: opts.headless ?? env.headless,
    useSession: opts.session && env.useSession,
  };

  if (opts.url && opts.input) {
    logger.error('Use either --url or --input, not both');
    return EXIT_FAILURE;
  }

  const targets = await resolveTargets(opts);
  if (targets.length === 0) {
    logger.error('No targets to scrape: pass --url <channel> or --input <file> with at least one line');
    return EXIT_FAILURE;
  }

  const sessionStore = new SessionStore({
    sessionFile: config.sessionFile,
    requiredCookies: config.requiredCookies,
    cookieTtlHours: config.cookieTtlHours,
  });
  const session = config.useSession ? await sessionStore.load() : null;
  if (!config.useSession) {
    logger.info('Session disabled, e-mails will be reported as needing sign-in');
  }

  const solver = config.captchaApiKey
    ? new ChallengeSolver({
        apiKey: config.captchaApiKey,
        transport: createAxiosTransport(config.captchaBaseUrl),
        pollIntervalMs: config.captchaPollIntervalMs,
      })
    : undefined;
  if (!solver) {
    logger.warn('CAPTCHA_API_KEY not set, challenges will not be solved');
  }

  const fetcher = new ProfileFetcher({
    pages: new BrowserManager(config),
    sessionStore,
    session,
    solver,
    navigationTimeoutMs: config.navigationTimeoutMs,
    challengeTimeoutMs: config.captchaTimeoutMs,
  });

  const exporter = new DataExporter({
    outputDir: opts.outputDir,
    baseName: opts.output,
    append: !opts.overwrite,
  });
  await exporter.init();

  const runner = new BatchRunner({
    fetcher,
    sink: exporter,
    delayBetweenProfilesMs: config.delayBetweenProfilesMs,
  });

  const { signal, dispose } = setupInterruptHandling();
  try {
    const result = await runner.run(targets, { signal });
    return result.interrupted ? EXIT_INTERRUPTED : EXIT_OK;
  } finally {
    dispose();
  }
}

async function runBalance(config: ScraperConfig): Promise<number> {
  const solver = new ChallengeSolver({
    apiKey: config.captchaApiKey ?? '',
    transport: createAxiosTransport(config.captchaBaseUrl),
  });
  const balance = await solver.getBalance();
  logger.info(`Challenge service balance: $${balance.toFixed(2)}`);
  return EXIT_OK;
}

// ─── Program ────────────────────────────────────────────────

export function createProgram(onExitCode: (code: number) => void): Command {
  const program = new Command();
  program
    .name('channel-scraper')
    .description('Scrape channel About pages, including the hidden contact e-mail');

  program
    .command('scrape')
    .description('Scrape one channel or a list of channels')
    .option('--url <url>', 'Single channel URL or @handle')
    .option('--input <file>', 'Text file with one channel per line')
    .option('--output <name>', 'Output file name without extension')
    .option('--output-dir <dir>', 'Output directory', '.')
    .option('--overwrite', 'Replace existing output instead of appending', false)
    .option('--headless', 'Run the browser headless')
    .option('--no-headless', 'Show the browser window')
    .option('--no-session', 'Ignore the saved session')
    .option('--debug', 'Verbose logging', false)
    .action(async (rawOptions: unknown) => {
      const opts = scrapeOptionsSchema.parse(rawOptions);
      const config = loadScraperConfig();
      setLogLevel(opts.debug ? 'debug' : config.logLevel);
      onExitCode(await runScrape(opts, config));
    });

  program
    .command('import-cookies')
    .description('Convert a browser-extension cookie export into the session file')
    .argument('<file>', 'Exported cookies (JSON)')
    .option('--session-file <file>', 'Where to write the session (default: SESSION_FILE)')
    .action(async (file: string, rawOptions: unknown) => {
      const opts = importOptionsSchema.parse(rawOptions);
      const config = loadScraperConfig();
      setLogLevel(config.logLevel);
      await importCookies(file, opts.sessionFile ?? config.sessionFile);
      onExitCode(EXIT_OK);
    });

  program
    .command('balance')
    .description('Show the challenge-service account balance')
    .action(async () => {
      const config = loadScraperConfig();
      setLogLevel(config.logLevel);
      onExitCode(await runBalance(config));
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  loadDotEnv();
  let exitCode = EXIT_OK;
  await createProgram((code) => {
    exitCode = code;
  }).parseAsync(argv);
  return exitCode;
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exit(code);
    })
    .catch((error: unknown) => {
      logger.error(`Fatal: ${getErrorMessage(error)}`, error);
      process.exit(EXIT_FAILURE);
    });
}
