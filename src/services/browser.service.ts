import path from 'node:path';
import webdriver from 'selenium-webdriver';
import type { By } from 'selenium-webdriver';
import type { WebDriverName } from '../config/cli.js';
import type { Logger } from '../utils/logger.js';

const { Builder, Browser } = webdriver;

export interface PageElement {
  getText(): Promise<string>;
  getAttribute(name: string): Promise<string>;
}

/**
 * The part of a selenium WebDriver the search lookups drive.
 */
export interface PageDriver {
  get(url: string): Promise<void>;
  findElement(locator: By): PromiseLike<PageElement>;
  quit(): Promise<void>;
}

export type DriverFactory = () => Promise<PageDriver>;

const BROWSERS: Record<WebDriverName, string> = {
  chrome: Browser.CHROME,
  firefox: Browser.FIREFOX,
  edge: Browser.EDGE,
  safari: Browser.SAFARI,
};

/**
 * Puts the directory of the driver executable at the front of PATH so
 * selenium resolves it before any other copy.
 */
export function prependDriverDirectory(driverPath: string, env: NodeJS.ProcessEnv = process.env): string {
  const dir = path.dirname(path.resolve(driverPath));
  env.PATH = env.PATH ? `${dir}${path.delimiter}${env.PATH}` : dir;
  return env.PATH;
}

export function createDriverFactory(name: WebDriverName, driverPath: string): DriverFactory {
  prependDriverDirectory(driverPath);
  const browser = BROWSERS[name];

  return async () => {
    const driver = await new Builder().forBrowser(browser).build();
    return driver;
  };
}

export type SessionState = 'active' | 'lost';

export class BrowserSession {
  private current: PageDriver | null = null;
  private _state: SessionState = 'lost';

  constructor(
    private factory: DriverFactory,
    private logger: Logger
  ) {}

  get state(): SessionState {
    return this._state;
  }

  async driver(): Promise<PageDriver> {
    if (!this.current) {
      this.current = await this.factory();
      this._state = 'active';
    }
    return this.current;
  }

  markLost(): void {
    this._state = 'lost';
  }

  /**
   * Drops the current driver and starts a fresh one.
   */
  async reacquire(): Promise<void> {
    const previous = this.current;
    this.current = null;

    if (previous) {
      try {
        await previous.quit();
      } catch (error: unknown) {
        this.logger.warn(
          { error: error instanceof Error ? error.message : String(error) },
          'Could not quit lost browser session'
        );
      }
    }

    this.current = await this.factory();
    this._state = 'active';
    this.logger.info('Browser session reacquired');
  }

  async close(): Promise<void> {
    if (!this.current) return;
    const driver = this.current;
    this.current = null;
    this._state = 'lost';
    await driver.quit();
  }
}
