import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createArchive } from './archive';
import { DICTIONARY_FILES } from './igo';
import { type Morpheme, type Tagger, Romanizer, loadRomanizer, romanizeHangul } from './romanize';

vi.mock('hangul-romanization', () => ({
  default: { convert: (text: string) => `[${text}]` }
}));

const taggerFor = (morphemes: Morpheme[]): Tagger => ({ parse: () => morphemes });

const silent = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

describe('Romanizer', () => {
  it('reads pronunciations, capitalises nouns and spaces words', () => {
    const romanizer = new Romanizer(
      taggerFor([
        { surface: '東京', feature: '名詞,固有名詞,地域,一般,*,*,東京,トウキョウ,トーキョー' },
        { surface: 'へ', feature: '助詞,格助詞,一般,*,*,*,へ,ヘ,エ' },
        { surface: '行く', feature: '動詞,自立,*,*,五段・カ行促音便,基本形,行く,イク,イク' }
      ])
    );

    expect(romanizer.romanize('東京へ行く')).toBe('Tōkyō e iku');
  });

  it('leaves symbols and spaces out Latin words after kana', () => {
    const romanizer = new Romanizer(
      taggerFor([
        { surface: '夏', feature: '名詞,一般,*,*,*,*,夏,ナツ,ナツ' },
        { surface: 'の', feature: '助詞,連体化,*,*,*,*,の,ノ,ノ' },
        { surface: 'Sky', feature: '名詞,固有名詞,組織,*,*,*,*' },
        { surface: '!', feature: '記号,一般,*,*,*,*,!,!,!' }
      ])
    );

    expect(romanizer.romanize('夏のSky!')).toBe('Natsu no Sky!');
  });

  it('falls back to the surface for unknown katakana words', () => {
    const romanizer = new Romanizer(taggerFor([{ surface: 'カメラ', feature: '名詞,一般,*,*,*,*,*' }]));

    expect(romanizer.romanize('カメラ')).toBe('Kamera');
  });

  it('normalises the result', () => {
    expect(new Romanizer(taggerFor([])).romanize('ＡＢＣ１２３')).toBe('ABC123');
  });

  it('romanizes Hangul before tagging', () => {
    expect(new Romanizer(taggerFor([])).romanize('안녕')).toBe('[안녕]');
  });
});

describe('romanizeHangul', () => {
  it('converts Hangul runs only', () => {
    expect(romanizeHangul('한국 Seoul 서울')).toBe('[한국] Seoul [서울]');
  });
});

describe('loadRomanizer', () => {
  let workDir: string;
  let archivePath: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'romanize-test-'));
    const dictionaryDir = join(workDir, 'ipadic');
    await mkdir(dictionaryDir);
    for (const name of DICTIONARY_FILES) {
      await writeFile(join(dictionaryDir, name), `data:${name}`);
    }
    archivePath = join(workDir, 'ipadic.zip');
    await createArchive(dictionaryDir, archivePath);
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('hands the unpacked dictionary to the tagger and removes it on close', async () => {
    const createTagger = vi.fn((dictionaryDir: string) => {
      expect(existsSync(join(dictionaryDir, 'word.dat'))).toBe(true);
      return taggerFor([{ surface: 'カメラ', feature: '名詞,一般,*,*,*,*,*' }]);
    });

    const loaded = await loadRomanizer(archivePath, createTagger, silent);

    expect(createTagger).toHaveBeenCalledWith(loaded.dictionaryDir);
    expect(loaded.romanizer.romanize('カメラ')).toBe('Kamera');

    await loaded.close();
    expect(existsSync(loaded.dictionaryDir)).toBe(false);
  });

  it('removes the unpacked dictionary when the tagger fails to load', async () => {
    let seen = '';
    const createTagger = async (dictionaryDir: string): Promise<Tagger> => {
      seen = dictionaryDir;
      throw new Error('bad dictionary');
    };

    await expect(loadRomanizer(archivePath, createTagger, silent)).rejects.toThrow('bad dictionary');
    expect(seen).not.toBe('');
    expect(existsSync(seen)).toBe(false);
  });
});
