import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { glob } from 'glob';
import { z } from 'zod';
import { isJsonObject, type JsonObject, type JsonValue } from '../utils/json-traversal.js';

export const SHOP_INDEX_FILE = 'index.json';

const PROCESSED_MENU = /^menu\..+-processed\.json$/;

const menuSchema = z.object({
  data: z.object({
    shop_info: z.object({
      id: z.union([z.string().min(1), z.number()]),
    }),
  }),
});

export type ShopInfo = JsonObject;
export type ShopIndex = Record<string, ShopInfo>;

export interface MenuFile {
  path: string;
  document: JsonObject;
  shopId: string;
  shopInfo: ShopInfo;
}

export class MenuLoadError extends Error {
  constructor(
    readonly path: string,
    reason: string
  ) {
    super(`Cannot load menu ${path} (${reason})`);
    this.name = 'MenuLoadError';
  }
}

/**
 * Menu files directly inside `dir`, sorted, without this tool's own outputs.
 */
export async function discoverMenus(dir: string): Promise<string[]> {
  const names = await glob('*.json', { cwd: dir, nodir: true });
  return names
    .filter((name) => name !== SHOP_INDEX_FILE && !PROCESSED_MENU.test(name))
    .sort()
    .map((name) => path.join(dir, name));
}

export async function loadMenu(menuPath: string): Promise<MenuFile> {
  let document: JsonValue;
  try {
    document = JSON.parse(await readFile(menuPath, 'utf-8'));
  } catch (error: unknown) {
    throw new MenuLoadError(menuPath, error instanceof Error ? error.message : String(error));
  }

  const result = menuSchema.safeParse(document);
  if (!result.success || !isJsonObject(document)) {
    throw new MenuLoadError(menuPath, 'missing data.shop_info.id');
  }

  // The parsed copy drops unknown keys; keep the live objects from the document.
  const data = document.data;
  const shopInfo = isJsonObject(data) ? data.shop_info : undefined;
  if (!isJsonObject(shopInfo)) {
    throw new MenuLoadError(menuPath, 'missing data.shop_info.id');
  }

  return {
    path: menuPath,
    document,
    shopId: String(result.data.data.shop_info.id),
    shopInfo,
  };
}

export function outputPathFor(menuPath: string): string {
  const { dir, name } = path.parse(menuPath);
  return path.join(dir, `menu.${name}-processed.json`);
}

export async function writeJson(filePath: string, value: JsonValue): Promise<void> {
  await writeFile(filePath, JSON.stringify(value, null, 4), 'utf-8');
}

export async function writeShopIndex(dir: string, shops: ShopIndex): Promise<string> {
  const indexPath = path.join(dir, SHOP_INDEX_FILE);
  await writeJson(indexPath, shops);
  return indexPath;
}
