import { pinyin } from 'pinyin-pro';

export interface Transliterator {
  transliterate(text: string): string;
}

export class PinyinService implements Transliterator {
  transliterate(text: string): string {
    return pinyin(text, { toneType: 'symbol', separator: ' ' });
  }
}

export const pinyinService = new PinyinService();
