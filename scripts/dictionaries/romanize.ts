import { rm } from 'node:fs/promises';

import hangulRomanization from 'hangul-romanization';
import { isKatakana, toRomaji } from 'wanakana';

import { type Logger, createLogger } from './logger';
import { unpackDictionary } from './package';

/**
 * One token from an Igo-style tagger. `feature` is the comma-separated ipadic
 * feature string: part of speech, three subdivisions, conjugation type and form,
 * base form, reading, pronunciation.
 */
export interface Morpheme {
  surface: string;
  feature: string;
}

export interface Tagger {
  parse(text: string): Morpheme[];
}

export type TaggerFactory = (dictionaryDir: string) => Tagger | Promise<Tagger>;

const SYMBOL = '記号';
const NOUN = '名詞';
const PRONUNCIATION = 8;
const COMBINING_MACRON = '\u0304';
const LONG_VOWEL_MARK = 'ー';

const HANGUL_RUN = /\p{Script=Hangul}+/gu;
const STARTS_ALPHANUMERIC = /^[\p{Alphabetic}\p{Number}]/u;

// Long vowel marks become '-' and then a macron over the preceding vowel.
const katakanaToRomaji = (katakana: string): string =>
  katakana
    .split(LONG_VOWEL_MARK)
    .map((part) => toRomaji(part))
    .join('-');

const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

export const romanizeHangul = (text: string): string =>
  text.replace(HANGUL_RUN, (run) => hangulRomanization.convert(run));

export class Romanizer {
  constructor(private readonly tagger: Tagger) {}

  romanize(input: string): string {
    let romanized = romanizeHangul(input);
    let insertSpace = false;
    // Index of the last replaced token; only moves forward.
    let lastIndex = 0;

    for (const { surface, feature } of this.tagger.parse(input)) {
      const features = feature.split(',');

      // Symbols stay as they are.
      if (features[0] === SYMBOL) {
        insertSpace = false;
        continue;
      }

      const index = romanized.indexOf(surface);
      if (index < 0) {
        continue;
      }

      const katakana = features[PRONUNCIATION] ?? (isKatakana(surface) ? surface : undefined);
      if (katakana) {
        let replacement = katakanaToRomaji(katakana);
        if (features[0] === NOUN) {
          replacement = capitalize(replacement);
        }
        replacement = replacement.replace(/-/g, COMBINING_MACRON);
        if (insertSpace) {
          replacement = ` ${replacement}`;
        }
        romanized = romanized.replace(surface, () => replacement);
        insertSpace = true;
      } else {
        if (insertSpace && STARTS_ALPHANUMERIC.test(surface)) {
          const at = romanized.indexOf(surface, lastIndex);
          if (at >= 0) {
            romanized = `${romanized.slice(0, at)} ${romanized.slice(at)}`;
          }
        }
        insertSpace = false;
      }

      lastIndex = index;
    }

    return romanized.normalize('NFKC');
  }
}

export interface LoadedRomanizer {
  romanizer: Romanizer;
  dictionaryDir: string;
  close(): Promise<void>;
}

/**
 * Unpacks the dictionary archive into a temporary directory and builds a
 * tagger over it. `close` removes the directory.
 */
export const loadRomanizer = async (
  archivePath: string,
  createTagger: TaggerFactory,
  logger: Logger = createLogger('dictionary:romanize')
): Promise<LoadedRomanizer> => {
  const { targetDir } = await unpackDictionary(archivePath, undefined, logger);
  try {
    const tagger = await createTagger(targetDir);
    return {
      romanizer: new Romanizer(tagger),
      dictionaryDir: targetDir,
      close: () => rm(targetDir, { recursive: true, force: true })
    };
  } catch (error) {
    await rm(targetDir, { recursive: true, force: true });
    throw error;
  }
};
