export interface LanguagePair {
  source: string;
  target: string;
}

/**
 * Batch translation. The result is aligned with `texts` by position.
 */
export interface TranslationService {
  readonly name: string;
  translate(texts: string[]): Promise<string[]>;
}

export class CredentialsError extends Error {
  constructor(message: string, readonly path?: string) {
    super(message);
    this.name = 'CredentialsError';
  }
}
