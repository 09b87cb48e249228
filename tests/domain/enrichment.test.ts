import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ENRICHMENT_CONFIG,
  detectCity,
  detectPrefecture,
  detectVenueType,
  extractContact,
  extractPricing,
  extractTags,
  extractTimes,
  inferCategory,
} from '../../src/domain/index.js';

const config = DEFAULT_ENRICHMENT_CONFIG;

describe('extractTimes', () => {
  it('carries 午後 over to an unmarked end time', () => {
    expect(extractTimes('午後1時～3時')).toEqual({ startTime: '13:00', endTime: '15:00' });
  });

  it('reads clock ranges', () => {
    expect(extractTimes('10:00〜16:00')).toEqual({ startTime: '10:00', endTime: '16:00' });
  });

  it('reads 半 as thirty minutes and leaves the end open', () => {
    expect(extractTimes('開場18時半')).toEqual({ startTime: '18:30', endTime: null });
  });

  it('ignores durations', () => {
    expect(extractTimes('所要3時間')).toEqual({ startTime: null, endTime: null });
  });
});

describe('extractPricing', () => {
  it('reads labelled prices with thousands separators', () => {
    expect(extractPricing('大人1,000円 子供500円')).toEqual({ adultPrice: 1000, childPrice: 500, isFree: false });
  });

  it('recognises free admission', () => {
    expect(extractPricing('入場無料')).toEqual({ isFree: true });
  });

  it('takes a bare amount as the adult price', () => {
    expect(extractPricing('参加費 800円')).toEqual({ adultPrice: 800, isFree: false });
  });

  it('returns null without any price', () => {
    expect(extractPricing('詳細は後日')).toBeNull();
  });
});

describe('extractContact', () => {
  it('reads organizer and phone', () => {
    expect(extractContact('主催：高岡七夕まつり実行委員会 TEL 0766-20-1234')).toEqual({
      phone: '0766-20-1234',
      email: '',
      website: '',
      organizer: '高岡七夕まつり実行委員会',
    });
  });

  it('returns null when nothing matches', () => {
    expect(extractContact('詳細は後日')).toBeNull();
  });
});

describe('inferCategory', () => {
  it.each([
    ['高岡七夕まつり', 'festival'],
    ['週末の朝市', 'market'],
    ['陶芸教室', 'education'],
    ['', 'other'],
  ])('%s → %s', (title, expected) => {
    expect(inferCategory(title, '', config)).toBe(expected);
  });
});

describe('place detection', () => {
  it('finds a city through its station name', () => {
    expect(detectCity('高岡駅前広場', config)).toBe('高岡市');
  });

  it('prefers a written prefecture and falls back to the default for known cities', () => {
    expect(detectPrefecture('石川県金沢市', '', config)).toBe('石川県');
    expect(detectPrefecture('高岡駅前', '高岡市', config)).toBe('富山県');
    expect(detectPrefecture('', '', config)).toBe('');
  });

  it('classifies venue types', () => {
    expect(detectVenueType('高岡市民会館', config)).toBe('ホール');
    expect(detectVenueType('環水公園', config)).toBe('公園');
  });
});

describe('extractTags', () => {
  it('returns tags in configured order', () => {
    expect(extractTags('親子で楽しむ屋外イベント 入場無料', config)).toEqual(['outdoor', 'family', 'free']);
  });
});
