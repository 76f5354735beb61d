import { TranslationServiceClient } from '@google-cloud/translate';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { CredentialsError, type LanguagePair, type TranslationService } from './translation.service.js';

const credentialsSchema = z
  .object({
    project_id: z.string().min(1),
  })
  .passthrough();

export type GoogleCredentials = z.infer<typeof credentialsSchema>;

export const GOOGLE_CREDENTIALS_ENV = 'GOOGLE_APPLICATION_CREDENTIALS';

/**
 * Reads the service account file and exposes its path to the Google client
 * libraries through GOOGLE_APPLICATION_CREDENTIALS.
 */
export async function loadGoogleCredentials(path: string): Promise<GoogleCredentials> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CredentialsError(`Cannot read credentials file (${reason})`, path);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CredentialsError(`Credentials file is not valid JSON (${reason})`, path);
  }

  const result = credentialsSchema.safeParse(json);
  if (!result.success) {
    throw new CredentialsError('Credentials file has no project_id', path);
  }

  process.env[GOOGLE_CREDENTIALS_ENV] = path;
  return result.data;
}

export class GoogleTranslateService implements TranslationService {
  readonly name = 'google';
  private client: TranslationServiceClient;
  private parent: string;

  constructor(
    projectId: string,
    private languages: LanguagePair
  ) {
    this.client = new TranslationServiceClient();
    this.parent = this.client.locationPath(projectId, 'global');
  }

  async translate(texts: string[]): Promise<string[]> {
    if (texts.length === 0) return [];

    const [response] = await this.client.translateText({
      parent: this.parent,
      contents: texts,
      mimeType: 'text/html',
      sourceLanguageCode: this.languages.source,
      targetLanguageCode: this.languages.target,
    });

    return (response.translations ?? []).map((t) => t.translatedText ?? '');
  }
}
