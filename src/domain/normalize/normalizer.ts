/**
 * Title and location canonicalization for comparison.
 *
 * Both functions are pure and deterministic. Each one runs its step list
 * until the text stops changing, so normalizing an already-normalized
 * string is a no-op.
 */

export interface NormalizerConfig {
  /** [alias, canonical] pairs mapped onto the Japanese canonical form. */
  readonly synonyms: readonly (readonly [string, string])[];
  /** Venue words mapped onto one spelling (location only). */
  readonly venueSynonyms: readonly (readonly [string, string])[];
  readonly prefectures: readonly string[];
  /** Municipality names with their 市/町/村 suffix, e.g. `高岡市`. */
  readonly municipalities: readonly string[];
  /** Place names that are part of an event's proper name; never stripped. */
  readonly protectedNames: readonly string[];
  readonly stopwords: readonly string[];
}

export const DEFAULT_NORMALIZER_CONFIG: NormalizerConfig = {
  synonyms: [
    ['festival', 'まつり'],
    ['matsuri', 'まつり'],
    ['フェスティバル', 'まつり'],
    ['フェスタ', 'まつり'],
    ['マツリ', 'まつり'],
    ['お祭り', 'まつり'],
    ['祭り', 'まつり'],
    ['祭', 'まつり'],
    ['tanabata', '七夕'],
    ['たなばた', '七夕'],
    ['fireworks', '花火'],
    ['hanabi', '花火'],
    ['はなび', '花火'],
    ['market', 'マルシェ'],
    ['マーケット', 'マルシェ'],
    ['concert', 'コンサート'],
    ['exhibition', '展示会'],
    ['marathon', 'マラソン'],
    ['toyama', '富山'],
    ['takaoka', '高岡'],
    ['uozu', '魚津'],
    ['himi', '氷見'],
    ['namerikawa', '滑川'],
    ['kurobe', '黒部'],
    ['tonami', '砺波'],
    ['oyabe', '小矢部'],
    ['nanto', '南砺'],
    ['imizu', '射水'],
    ['yatsuo', '八尾'],
    ['tateyama', '立山'],
  ],
  venueSynonyms: [
    ['会館', 'ホール'],
    ['公会堂', 'ホール'],
    ['アリーナ', '体育館'],
  ],
  prefectures: ['富山県', '石川県', '岐阜県', '新潟県', '長野県'],
  municipalities: [
    '富山市', '高岡市', '魚津市', '氷見市', '滑川市', '黒部市', '砺波市', '小矢部市',
    '南砺市', '射水市', '上市町', '立山町', '入善町', '朝日町', '舟橋村',
  ],
  protectedNames: ['八尾町', '岩瀬', '城端', '井波', '五箇山', '福光', '庄川', '新湊', '伏木', '婦中'],
  stopwords: ['the', 'a', 'an', 'of', 'and', 'event', 'events', 'in', 'at', 'on'],
};

export interface Normalizer {
  normalizeTitle(title: string): string;
  normalizeLocation(location: string): string;
}

type Step = (text: string) => string;

const MAX_PASSES = 8;
const ASCII_WORD = /^[\x20-\x7e]+$/;
// Names are followed by these when they are part of a longer proper noun
// (富山県立…, 高岡市民会館, 魚津市役所).
const COMPOUND_GUARD = '(?![民立役営庁])';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Katakana → hiragana so ア and あ compare equal. */
export function foldKana(text: string): string {
  return text.replace(/[ァ-ヶ]/g, (ch) => String.fromCharCode(ch.charCodeAt(0) - 0x60));
}

/** Width folding, case folding and kana folding. */
export function foldText(text: string): string {
  return foldKana(text.normalize('NFKC').toLowerCase());
}

function replaceAllUntilStable(text: string, pattern: RegExp, replacement: string): string {
  let previous: string;
  let current = text;
  do {
    previous = current;
    current = current.replace(pattern, replacement);
  } while (current !== previous);
  return current;
}

function compileSynonyms(pairs: readonly (readonly [string, string])[]): Step {
  const compiled = pairs
    .map(([alias, canonical]) => [foldText(alias), foldText(canonical)] as const)
    .sort((a, b) => b[0].length - a[0].length)
    .map(([alias, canonical]) => {
      const source = ASCII_WORD.test(alias) ? `\\b${escapeRegExp(alias)}\\b` : escapeRegExp(alias);
      return [new RegExp(source, 'g'), canonical] as const;
    });

  return (text) => compiled.reduce((acc, [pattern, canonical]) => acc.replace(pattern, canonical), text);
}

/**
 * Masks protected names with private-use placeholders while `inner` runs,
 * so stripping steps cannot touch them.
 */
function protect(names: readonly string[], inner: Step): Step {
  const folded = [...new Set(names.map(foldText))].sort((a, b) => b.length - a.length);
  return (text) => {
    let masked = text;
    folded.forEach((name, i) => {
      masked = masked.split(name).join(String.fromCharCode(0xe000 + i));
    });
    let result = inner(masked);
    folded.forEach((name, i) => {
      result = result.split(String.fromCharCode(0xe000 + i)).join(name);
    });
    return result;
  };
}

function compileAdministrative(config: NormalizerConfig): Step {
  const prefectures = config.prefectures.map(foldText).sort((a, b) => b.length - a.length);
  const municipalities = config.municipalities.map(foldText).sort((a, b) => b.length - a.length);

  const prefecturePattern = prefectures.length > 0
    ? new RegExp(`(?:${prefectures.map(escapeRegExp).join('|')})${COMPOUND_GUARD}`, 'g')
    : null;
  const municipalPatterns = municipalities.map((name) =>
    [new RegExp(`${escapeRegExp(name)}${COMPOUND_GUARD}`, 'g'), name.slice(0, -1)] as const);

  const strip: Step = (text) => {
    let out = prefecturePattern !== null ? text.replace(prefecturePattern, ' ') : text;
    for (const [pattern, base] of municipalPatterns) {
      out = out.replace(pattern, base);
    }
    return out;
  };

  return protect(config.protectedNames, strip);
}

const removeBrackets: Step = (text) => [
  /\([^()]*\)/g,
  /\[[^[\]]*\]/g,
  /【[^【】]*】/g,
  /〈[^〈〉]*〉/g,
  /《[^《》]*》/g,
  /<[^<>]*>/g,
].reduce((acc, pattern) => replaceAllUntilStable(acc, pattern, ' '), text);

const PUNCTUATION = /[・·•!?。、,:;"'“”‘’『』「」〔〕{}…♪☆★◆◇■□●○※*_/\\|#.]/g;

const collapseWhitespace: Step = (text) => text
  .replace(PUNCTUATION, ' ')
  .replace(/\s+/g, ' ')
  .trim()
  // whitespace carries no meaning next to Japanese text
  .replace(/ (?=[^\x00-\x7f])|(?<=[^\x00-\x7f]) /g, '');

function compileStopwords(words: readonly string[]): Step {
  const stop = new Set(words.map(foldText));
  return (text) => text.split(' ').filter((token) => !stop.has(token)).join(' ');
}

// Text is already kana-folded when these run, hence hiragana spellings.
const TITLE_STRIPPERS: readonly Step[] = [
  // ordinal counters
  (t) => t.replace(/第\s*\d+\s*回目?/g, ' '),
  // era and western years
  (t) => t.replace(/(?:令和|平成|昭和)\s*(?:\d{1,2}|元)\s*年度?/g, ' '),
  (t) => t.replace(/(?:西暦)?(?<!\d)(?:19|20)\d{2}(?!\d)\s*(?:年度|年)?/g, ' '),
  // administrative anniversaries
  (t) => t.replace(/(?:市制|町制|村制|県政|開港|開園|開館|開業|創立|創業|誕生)?\s*\d+\s*周年(?:記念)?/g, ' '),
  removeBrackets,
  // trailing content after range, venue and time separators
  (t) => t
    .replace(/\s*[~〜–—-].*$/, '')
    .replace(/\s*(?:会場|にて|@|開催|※|\*).*$/, '')
    .replace(/\s*\d{1,2}:\d{2}.*$/, '')
    .replace(/\s*(?:午前|午後)?\d{1,2}時.*$/, '')
    .replace(/\s*\d{1,2}月\d{1,2}日.*$/, '')
    .replace(/\s+(?:at|in)\s.*$/, ''),
  // booking and ticket boilerplate
  (t) => t.replace(/要予約|予約不要|予約制|要申込|申込不要|事前申込制?|入場無料|参加無料|観覧無料|無料|ちけっと(?:販売|発売)?中?|前売り?券?|当日券/g, ' '),
  // generic event nouns
  (t) => t.replace(/大会|いべんと/g, ' '),
];

const AREA_QUALIFIERS = /(?:中心部|中心街|周辺|一帯|一円|えりあ|界隈|付近)$/;

function runUntilStable(steps: readonly Step[], input: string): string {
  let current = input;
  for (let pass = 0; pass < MAX_PASSES; pass++) {
    const next = steps.reduce((acc, step) => step(acc), current);
    if (next === current) break;
    current = next;
  }
  return [...current].length <= 1 ? '' : current;
}

/** Build a normalizer over an immutable configuration. */
export function createNormalizer(config: NormalizerConfig = DEFAULT_NORMALIZER_CONFIG): Normalizer {
  const synonyms = compileSynonyms(config.synonyms);
  const venueSynonyms = compileSynonyms(config.venueSynonyms);
  const administrative = compileAdministrative(config);
  const stopwords = compileStopwords(config.stopwords);

  const titleSteps: readonly Step[] = [
    foldText,
    synonyms,
    ...TITLE_STRIPPERS,
    administrative,
    collapseWhitespace,
    stopwords,
  ];

  const locationSteps: readonly Step[] = [
    foldText,
    synonyms,
    administrative,
    removeBrackets,
    collapseWhitespace,
    (t) => t.replace(AREA_QUALIFIERS, ''),
    venueSynonyms,
  ];

  return {
    normalizeTitle: (title) => runUntilStable(titleSteps, title),
    normalizeLocation: (location) => runUntilStable(locationSteps, location),
  };
}
