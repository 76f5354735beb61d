import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { discoverMenus, loadMenu, MenuLoadError, outputPathFor } from './menu-store.service.js';

describe('menu store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'menu-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('discovers top-level menus in name order, skipping outputs', async () => {
    for (const name of ['b.json', 'a.json', 'index.json', 'menu.a-processed.json', 'notes.txt']) {
      await writeFile(path.join(dir, name), '{}', 'utf-8');
    }
    await mkdir(path.join(dir, 'nested'));
    await writeFile(path.join(dir, 'nested', 'c.json'), '{}', 'utf-8');

    await expect(discoverMenus(dir)).resolves.toEqual([path.join(dir, 'a.json'), path.join(dir, 'b.json')]);
  });

  it('loads a menu and keeps the live shop info object', async () => {
    const file = path.join(dir, 'a.json');
    await writeFile(file, JSON.stringify({ data: { shop_info: { id: 42, name: '老王' } } }), 'utf-8');

    const menu = await loadMenu(file);

    expect(menu.shopId).toBe('42');
    expect(menu.shopInfo).toEqual({ id: 42, name: '老王' });

    menu.shopInfo.name = { value: '老王' };
    expect(menu.document).toEqual({ data: { shop_info: { id: 42, name: { value: '老王' } } } });
  });

  it('rejects menus without a shop id', async () => {
    const file = path.join(dir, 'a.json');
    await writeFile(file, JSON.stringify({ data: { shop_info: { name: 'x' } } }), 'utf-8');

    await expect(loadMenu(file)).rejects.toBeInstanceOf(MenuLoadError);
  });

  it('rejects files that are not JSON', async () => {
    const file = path.join(dir, 'a.json');
    await writeFile(file, 'not json', 'utf-8');

    await expect(loadMenu(file)).rejects.toThrow(/^Cannot load menu/);
  });

  it('names the output after the input', () => {
    expect(outputPathFor(path.join('menus', 'shop1.json'))).toBe(path.join('menus', 'menu.shop1-processed.json'));
  });
});
