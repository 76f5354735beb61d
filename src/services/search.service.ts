import webdriver from 'selenium-webdriver';
import type { BrowserSession } from './browser.service.js';
import { retryOnSessionLoss } from '../utils/retry.js';
import type { Logger } from '../utils/logger.js';

const { By } = webdriver;

export interface PageSelector {
  xpath: string;
  /** Attribute to read; the element text when omitted. */
  attribute?: string;
}

export type SessionErrorClassifier = (error: unknown) => boolean;

export function isNoSuchSessionError(error: unknown): boolean {
  return error instanceof webdriver.error.NoSuchSessionError;
}

export const KNOWLEDGE_GRAPH_SELECTORS: PageSelector[] = [
  { xpath: "//*[contains(@class,'kno-ecr-pt')]/span" },
  { xpath: "//*[contains(@class,'kno-ecr-pt')]/following-sibling::node()/span" },
];

export const IMAGE_SELECTORS: PageSelector[] = [{ xpath: "//*[contains(@class,'rg_i')]", attribute: 'src' }];

export interface SearchServiceOptions {
  baseUrl: string;
  logger: Logger;
  /** Reacquisitions allowed per lookup; 0 retries forever. */
  retryLimit?: number;
  isSessionError?: SessionErrorClassifier;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SearchService {
  private baseUrl: string;
  private logger: Logger;
  private retryLimit: number;
  private isSessionError: SessionErrorClassifier;

  constructor(
    private session: BrowserSession,
    options: SearchServiceOptions
  ) {
    this.baseUrl = options.baseUrl;
    this.logger = options.logger;
    this.retryLimit = options.retryLimit ?? 0;
    this.isSessionError = options.isSessionError ?? isNoSuchSessionError;
  }

  knowledgeGraphUrl(query: string): string {
    return `${this.baseUrl}?q=${encodeURIComponent(query)}`;
  }

  imageSearchUrl(query: string): string {
    return `${this.baseUrl}?tbm=isch&q=${encodeURIComponent(query)}+food`;
  }

  /**
   * Loads `url` and reads every selector that matches, in order.
   * Resolves to null when the browser session is gone; a page that fails
   * to load or has no matching element is just an empty or shorter result.
   */
  async getPage(url: string, selectors: PageSelector[]): Promise<string[] | null> {
    const driver = await this.session.driver();

    try {
      await driver.get(url);
    } catch (error: unknown) {
      if (this.isSessionError(error)) {
        this.session.markLost();
        return null;
      }
      this.logger.error({ url, error: errorMessage(error) }, 'Failed to load page');
      return [];
    }

    const results: string[] = [];
    for (const selector of selectors) {
      try {
        const element = await driver.findElement(By.xpath(selector.xpath));
        const value = selector.attribute
          ? await element.getAttribute(selector.attribute)
          : await element.getText();
        results.push(value);
      } catch (error: unknown) {
        if (this.isSessionError(error)) {
          this.session.markLost();
          return null;
        }
        this.logger.debug({ url, xpath: selector.xpath, error: errorMessage(error) }, 'Selector not found');
      }
    }

    return results;
  }

  async knowledgeGraph(query: string): Promise<string | undefined> {
    const results = await this.withSession(() => this.getPage(this.knowledgeGraphUrl(query), KNOWLEDGE_GRAPH_SELECTORS));
    return results[0];
  }

  async googleImage(query: string): Promise<string | undefined> {
    const results = await this.withSession(() => this.getPage(this.imageSearchUrl(query), IMAGE_SELECTORS));
    return results[0];
  }

  private withSession(lookup: () => Promise<string[] | null>): Promise<string[]> {
    return retryOnSessionLoss(lookup, () => this.session.reacquire(), {
      limit: this.retryLimit,
      onRetry: (attempt) => this.logger.warn({ attempt }, 'Browser session lost, starting a new one'),
    });
  }
}
