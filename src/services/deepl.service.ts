import * as deepl from 'deepl-node';
import { CredentialsError, type LanguagePair, type TranslationService } from './translation.service.js';

/**
 * DeepL wants bare source codes (`zh`) and regional English targets (`en-US`).
 */
export function toDeepLLanguages(languages: LanguagePair): LanguagePair {
  const source = languages.source.split('-')[0].toLowerCase();
  const target = languages.target.toLowerCase() === 'en' ? 'en-US' : languages.target;
  return { source, target };
}

export class DeepLService implements TranslationService {
  readonly name = 'deepl';
  private translator: deepl.Translator;
  private languages: LanguagePair;

  constructor(authKey: string | undefined, languages: LanguagePair) {
    if (!authKey) {
      throw new CredentialsError('DEEPL_AUTH_KEY is not set');
    }
    this.translator = new deepl.Translator(authKey);
    this.languages = toDeepLLanguages(languages);
  }

  async translate(texts: string[]): Promise<string[]> {
    if (texts.length === 0) return [];

    const results = await this.translator.translateText(
      texts,
      this.languages.source as deepl.SourceLanguageCode,
      this.languages.target as deepl.TargetLanguageCode,
      { tagHandling: 'html' }
    );

    return results.map((r) => r.text);
  }
}
