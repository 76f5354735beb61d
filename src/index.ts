#!/usr/bin/env node
import { env } from './config/env.js';
import { CliUsageError, parseCli, USAGE, type CliOptions, type ParsedCli } from './config/cli.js';
import { createLogger, type Logger } from './utils/logger.js';
import { BrowserSession, createDriverFactory } from './services/browser.service.js';
import { SearchService } from './services/search.service.js';
import { pinyinService } from './services/pinyin.service.js';
import { DeepLService } from './services/deepl.service.js';
import { GoogleTranslateService, loadGoogleCredentials } from './services/google-translate.service.js';
import { CredentialsError, type TranslationService } from './services/translation.service.js';
import { runWithBrowser } from './services/menu-enrichment.service.js';

async function createTranslator(options: CliOptions, logger: Logger): Promise<TranslationService> {
  const languages = { source: env.SOURCE_LANG, target: env.TARGET_LANG };

  if (options.translator === 'deepl') {
    return new DeepLService(env.DEEPL_AUTH_KEY, languages);
  }

  if (!options.gapps) {
    throw new CredentialsError('--gapps is required with the google translator');
  }
  const credentials = await loadGoogleCredentials(options.gapps);
  logger.info({ projectId: credentials.project_id }, 'Loaded Google credentials');
  return new GoogleTranslateService(credentials.project_id, languages);
}

async function run(options: CliOptions, logger: Logger) {
  const translator = await createTranslator(options, logger);
  const session = new BrowserSession(createDriverFactory(options.webdriver, options.webdriverPath), logger);
  const search = new SearchService(session, {
    baseUrl: env.SEARCH_BASE_URL,
    retryLimit: env.SESSION_RETRY_LIMIT,
    logger,
  });

  const summary = await runWithBrowser(options.menus, session, {
    translator,
    transliterator: pinyinService,
    search,
    logger,
    lookupDelayMs: env.LOOKUP_DELAY_MS,
  });
  logger.info(
    { processed: summary.processed, failed: summary.failed, shops: Object.keys(summary.shops).length },
    'Run finished'
  );
}

async function main() {
  let parsed: ParsedCli;
  try {
    parsed = parseCli(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.issues.join('\n'));
      console.error(USAGE);
      process.exit(1);
    }
    throw err;
  }

  if (parsed.kind === 'help') {
    console.log(USAGE);
    return;
  }

  const logger = createLogger({ logFile: parsed.options.log });
  try {
    await run(parsed.options, logger);
  } catch (err) {
    logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Run aborted');
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
