import { describe, expect, it, vi } from 'vitest';
import type { By } from 'selenium-webdriver';
import { BrowserSession, type PageDriver, type PageElement } from './browser.service.js';
import { KNOWLEDGE_GRAPH_SELECTORS, SearchService } from './search.service.js';
import { silentLogger } from '../utils/logger.js';

class SessionGone extends Error {}

interface FakeElement {
  text?: string;
  attributes?: Record<string, string>;
}

interface FakeDriverOptions {
  elements?: Record<string, FakeElement>;
  failNavigation?: Error;
  loseSession?: boolean;
}

function fakeDriver(options: FakeDriverOptions = {}) {
  const visited: string[] = [];
  return {
    visited,
    async get(url: string) {
      if (options.failNavigation) throw options.failNavigation;
      visited.push(url);
    },
    async findElement(locator: By): Promise<PageElement> {
      if (options.loseSession) throw new SessionGone('invalid session id');
      const element = options.elements?.[locator.value];
      if (!element) throw new Error(`no such element: ${locator.value}`);
      return {
        getText: async () => element.text ?? '',
        getAttribute: async (name: string) => element.attributes?.[name] ?? '',
      };
    },
    quit: vi.fn(async () => {}),
  };
}

const TITLE = "//*[contains(@class,'kno-ecr-pt')]/span";
const DESCRIPTION = "//*[contains(@class,'kno-ecr-pt')]/following-sibling::node()/span";
const THUMBNAIL = "//*[contains(@class,'rg_i')]";

function setup(drivers: PageDriver[]) {
  const factory = vi.fn(async () => {
    const next = drivers.shift();
    if (!next) throw new Error('no more drivers');
    return next;
  });
  const session = new BrowserSession(factory, silentLogger);
  const search = new SearchService(session, {
    baseUrl: 'https://www.google.com/search',
    logger: silentLogger,
    isSessionError: (error) => error instanceof SessionGone,
  });
  return { factory, session, search };
}

describe('SearchService', () => {
  it('builds encoded search URLs', () => {
    const { search } = setup([]);

    expect(search.knowledgeGraphUrl('烤鸭')).toBe('https://www.google.com/search?q=%E7%83%A4%E9%B8%AD');
    expect(search.imageSearchUrl('烤鸭')).toBe(
      'https://www.google.com/search?tbm=isch&q=%E7%83%A4%E9%B8%AD+food'
    );
  });

  it('reads the knowledge panel title first', async () => {
    const driver = fakeDriver({
      elements: { [TITLE]: { text: 'Peking duck' }, [DESCRIPTION]: { text: 'Roast duck dish' } },
    });
    const { search } = setup([driver]);

    await expect(search.knowledgeGraph('烤鸭')).resolves.toBe('Peking duck');
    expect(driver.visited).toEqual(['https://www.google.com/search?q=%E7%83%A4%E9%B8%AD']);
  });

  it('keeps an empty title in first place', async () => {
    const driver = fakeDriver({
      elements: { [TITLE]: { text: '' }, [DESCRIPTION]: { text: 'A description' } },
    });
    const { search } = setup([driver]);

    await expect(search.getPage('https://example.test/', KNOWLEDGE_GRAPH_SELECTORS)).resolves.toEqual([
      '',
      'A description',
    ]);
    await expect(search.knowledgeGraph('烤鸭')).resolves.toBe('');
  });

  it('reads the image thumbnail source attribute', async () => {
    const driver = fakeDriver({
      elements: { [THUMBNAIL]: { attributes: { src: 'data:image/jpeg;base64,AAAA' } } },
    });
    const { search } = setup([driver]);

    await expect(search.googleImage('烤鸭')).resolves.toBe('data:image/jpeg;base64,AAAA');
  });

  it('treats a missing element as no data without a new session', async () => {
    const { search, factory, session } = setup([fakeDriver()]);

    await expect(search.getPage('https://example.test/', [{ xpath: TITLE }])).resolves.toEqual([]);
    await expect(search.knowledgeGraph('烤鸭')).resolves.toBeUndefined();
    expect(factory).toHaveBeenCalledTimes(1);
    expect(session.state).toBe('active');
  });

  it('treats a failed navigation as no data', async () => {
    const { search, factory } = setup([fakeDriver({ failNavigation: new Error('net::ERR_TIMED_OUT') })]);

    await expect(search.knowledgeGraph('烤鸭')).resolves.toBeUndefined();
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('signals a lost session with null', async () => {
    const { search, session } = setup([fakeDriver({ loseSession: true })]);

    await expect(search.getPage('https://example.test/', [{ xpath: TITLE }])).resolves.toBeNull();
    expect(session.state).toBe('lost');
  });

  it('starts exactly one new session and repeats the lookup', async () => {
    const lost = fakeDriver({ loseSession: true });
    const fresh = fakeDriver({ elements: { [TITLE]: { text: 'Peking duck' } } });
    const { search, factory, session } = setup([lost, fresh]);

    await expect(search.knowledgeGraph('烤鸭')).resolves.toBe('Peking duck');
    expect(factory).toHaveBeenCalledTimes(2);
    expect(lost.quit).toHaveBeenCalledTimes(1);
    expect(fresh.visited).toHaveLength(1);
    expect(session.state).toBe('active');
  });
});
