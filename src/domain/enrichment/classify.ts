import type { EventCategory } from '../event.js';
import { DEFAULT_NORMALIZER_CONFIG } from '../normalize/normalizer.js';

export interface EnrichmentConfig {
  /** Evaluated in declaration order; on a tied score the earlier category wins. */
  readonly categoryPatterns: readonly (readonly [EventCategory, readonly string[]])[];
  readonly tagPatterns: readonly (readonly [string, string])[];
  readonly venueTypes: readonly (readonly [string, string])[];
  readonly municipalities: readonly string[];
  readonly prefectures: readonly string[];
  /** Prefecture assumed when a city is known but none is written. */
  readonly defaultPrefecture: string;
}

export const DEFAULT_ENRICHMENT_CONFIG: EnrichmentConfig = {
  categoryPatterns: [
    ['festival', ['まつり|祭り|festival|フェスティバル|盆踊り|花火|hanabi|fireworks', 'おわら|風の盆|七夕|tanabata|神楽|太鼓']],
    ['market', ['朝市|市場|マーケット|market|マルシェ|バザー|販売会', '物産展|特産品|直売|産直']],
    ['sports', ['スポーツ|運動|競技|sports|マラソン|marathon|サッカー', '野球|テニス|ゴルフ|水泳|ウォーキング']],
    ['culture', ['展示|exhibition|美術館|博物館|museum|アート|文化', 'コンサート|concert|演奏|音楽|music|劇場']],
    ['food', ['グルメ|料理|食べ物|food|レストラン|酒|sake', 'ワイン|wine|ビール|beer|フード|食材']],
    ['nature', ['自然|nature|公園|park|登山|hiking|海岸', '桜|紅葉|花見|ハイキング|キャンプ']],
    ['entertainment', ['エンターテイメント|entertainment|ショー|パフォーマンス', '映画|movie|アニメ|ゲーム|イルミネーション']],
    ['education', ['講座|lecture|セミナー|seminar|教室|学習', '体験|ワークショップ|workshop|教育']],
    ['business', ['ビジネス|business|企業|会議|商談', 'カンファレンス|conference|交流会|startup']],
  ],
  tagPatterns: [
    ['outdoor', '屋外|野外|アウトドア|outdoor'],
    ['indoor', '屋内|室内|インドア|indoor|ホール'],
    ['family', '家族|ファミリー|親子|family|子ども|子供'],
    ['beginner', '初心者|ビギナー|beginner|初級'],
    ['traditional', '伝統|和風|traditional|古典'],
    ['limited', '限定|special'],
    ['free', '無料|free'],
  ],
  venueTypes: [
    ['ホール|会館|センター', 'ホール'],
    ['公園|パーク', '公園'],
    ['広場|プラザ', '広場'],
    ['体育館|アリーナ', '体育館'],
    ['美術館|博物館|資料館', '文化施設'],
    ['商店街|アーケード', '商店街'],
    ['駅前|駅周辺', '駅周辺'],
    ['海岸|ビーチ|浜', '海岸'],
    ['高原|スキー場', '山間部'],
  ],
  municipalities: DEFAULT_NORMALIZER_CONFIG.municipalities,
  prefectures: DEFAULT_NORMALIZER_CONFIG.prefectures,
  defaultPrefecture: '富山県',
};

function countMatches(text: string, pattern: string): number {
  return [...text.matchAll(new RegExp(pattern, 'gi'))].length;
}

/** Highest weighted keyword hit count over title + description; `other` when nothing hits. */
export function inferCategory(title: string, description: string, config: EnrichmentConfig): EventCategory {
  const text = `${title} ${description}`.normalize('NFKC');

  let best: EventCategory = 'other';
  let bestScore = 0;
  for (const [category, patterns] of config.categoryPatterns) {
    const score = patterns.reduce((sum, p) => sum + countMatches(text, p), 0);
    if (score > bestScore) {
      best = category;
      bestScore = score;
    }
  }
  return best;
}

export function extractTags(text: string, config: EnrichmentConfig): string[] {
  const folded = text.normalize('NFKC');
  return config.tagPatterns
    .filter(([, pattern]) => new RegExp(pattern, 'i').test(folded))
    .map(([tag]) => tag);
}

/**
 * First configured municipality named in the text, either in full
 * (`高岡市`) or through its station (`高岡駅`). Empty when none.
 */
export function detectCity(text: string, config: EnrichmentConfig): string {
  for (const name of config.municipalities) {
    if (text.includes(name) || text.includes(`${name.slice(0, -1)}駅`)) return name;
  }
  return '';
}

export function detectPrefecture(text: string, city: string, config: EnrichmentConfig): string {
  const named = config.prefectures.find((p) => text.includes(p));
  if (named !== undefined) return named;
  return city !== '' ? config.defaultPrefecture : '';
}

export function detectVenueType(text: string, config: EnrichmentConfig): string {
  const hit = config.venueTypes.find(([pattern]) => new RegExp(pattern).test(text));
  return hit === undefined ? '' : hit[1];
}
