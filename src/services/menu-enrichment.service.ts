import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import {
  collectValues,
  replaceEntry,
  traverseJson,
  type JsonObject,
  type JsonValue,
} from '../utils/json-traversal.js';
import { isTranslatableValue, pinyinProjection } from '../utils/translatable.js';
import type { Logger } from '../utils/logger.js';
import type { TranslationService } from './translation.service.js';
import type { Transliterator } from './pinyin.service.js';
import type { BrowserSession } from './browser.service.js';
import {
  discoverMenus,
  loadMenu,
  outputPathFor,
  SHOP_INDEX_FILE,
  writeJson,
  writeShopIndex,
  type MenuFile,
  type ShopIndex,
} from './menu-store.service.js';

export interface WebLookup {
  knowledgeGraph(query: string): Promise<string | undefined>;
  googleImage(query: string): Promise<string | undefined>;
}

export interface EnrichmentDeps {
  translator: TranslationService;
  transliterator: Transliterator;
  search: WebLookup;
  logger: Logger;
  /** Pause after the web lookups of each priced item. */
  lookupDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface EnrichmentResult {
  values: number;
  translated: boolean;
}

export type MenuStatus = 'written' | 'load-failed' | 'enrich-failed' | 'write-failed';

export interface MenuOutcome {
  shops: ShopIndex;
  status: MenuStatus;
}

export interface RunSummary {
  processed: number;
  failed: number;
  shops: ShopIndex;
  indexPath?: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function hasPrice(container: JsonValue[] | JsonObject): boolean {
  return !Array.isArray(container) && Object.prototype.hasOwnProperty.call(container, 'price');
}

async function translateAll(texts: string[], deps: EnrichmentDeps, label: string): Promise<string[] | null> {
  try {
    return await deps.translator.translate(texts);
  } catch (error: unknown) {
    deps.logger.error(
      { path: label, translator: deps.translator.name, error: errorMessage(error) },
      'Translation failed'
    );
    return null;
  }
}

/**
 * Replaces every translatable string of `document` with a record carrying
 * its pinyin, translation and, for priced items, web search results.
 *
 * Translations are matched to strings by visiting position, so the document
 * must not change shape between the collecting walk and the rewriting walk.
 */
export async function enrichDocument(
  document: JsonValue,
  deps: EnrichmentDeps,
  label = 'document'
): Promise<EnrichmentResult> {
  const wait = deps.sleep ?? sleep;
  const values = collectValues(document, isTranslatableValue);
  const translations = await translateAll(values, deps, label);

  let j = 0;
  for (const entry of traverseJson(document, isTranslatableValue)) {
    deps.logger.info({ path: label }, `${j + 1} / ${values.length}`);

    const value = entry.value;
    const record: JsonObject = { value };
    replaceEntry(entry, record);

    const projection = pinyinProjection(value);
    if (projection.length > 0) {
      record.pinyin = deps.transliterator.transliterate(projection);
    }

    if (hasPrice(entry.container)) {
      const knowledgeGraph = await deps.search.knowledgeGraph(value);
      const image = await deps.search.googleImage(value);

      if (knowledgeGraph !== undefined) record.knowledge_graph = knowledgeGraph;
      if (image !== undefined) record.google_image = image;

      await wait(deps.lookupDelayMs);
    }

    if (translations && j < translations.length) {
      record.translation = translations[j];
    }

    j++;
  }

  return { values: values.length, translated: translations !== null };
}

export async function processMenuFile(
  menuPath: string,
  shops: ShopIndex,
  deps: EnrichmentDeps
): Promise<MenuOutcome> {
  let menu: MenuFile;
  try {
    menu = await loadMenu(menuPath);
  } catch (error: unknown) {
    deps.logger.error({ path: menuPath, error: errorMessage(error) }, 'Failed to load menu');
    return { shops, status: 'load-failed' };
  }

  const next: ShopIndex = { ...shops, [menu.shopId]: menu.shopInfo };

  try {
    const result = await enrichDocument(menu.document, deps, menuPath);
    deps.logger.info({ path: menuPath, ...result }, 'Menu enriched');
  } catch (error: unknown) {
    deps.logger.error({ path: menuPath, error: errorMessage(error) }, 'Failed to enrich menu');
    return { shops: next, status: 'enrich-failed' };
  }

  const outputPath = outputPathFor(menuPath);
  try {
    await writeJson(outputPath, menu.document);
  } catch (error: unknown) {
    deps.logger.error({ path: menuPath, output: outputPath, error: errorMessage(error) }, 'Failed to write menu');
    return { shops: next, status: 'write-failed' };
  }

  return { shops: next, status: 'written' };
}

export async function runEnrichment(menusDir: string, deps: EnrichmentDeps): Promise<RunSummary> {
  const menus = await discoverMenus(menusDir);
  let shops: ShopIndex = {};
  let processed = 0;
  let failed = 0;

  for (const [i, menuPath] of menus.entries()) {
    deps.logger.info(`Processing ${menuPath} (${i + 1}/${menus.length})`);
    const outcome = await processMenuFile(menuPath, shops, deps);
    shops = outcome.shops;
    if (outcome.status === 'written') processed++;
    else failed++;
  }

  const summary: RunSummary = { processed, failed, shops };
  try {
    summary.indexPath = await writeShopIndex(menusDir, shops);
  } catch (error: unknown) {
    deps.logger.error(
      { path: path.join(menusDir, SHOP_INDEX_FILE), error: errorMessage(error) },
      'Failed to write shop index'
    );
  }

  return summary;
}

/**
 * Starts the browser before the first menu so a driver that cannot be
 * built fails the run instead of every priced menu.
 */
export async function runWithBrowser(
  menusDir: string,
  session: Pick<BrowserSession, 'driver' | 'close'>,
  deps: EnrichmentDeps
): Promise<RunSummary> {
  await session.driver();
  try {
    return await runEnrichment(menusDir, deps);
  } finally {
    await session.close();
  }
}
