/**
 * Search Parameters Tests
 *
 * Tests for the search filter builder:
 * - Bit mask encoding for categories and purity
 * - Sorting, range and order normalization
 * - Page coercion
 * - Query and tag/user token handling
 * - Optional filters (resolution, ratio, colour, seed)
 * - Resets
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  SearchParameters,
  normalizeOption,
  toBitMask,
} from '../search-parameters.service.js';
import { ValidationError, isWallhavenError } from '../wallhaven-errors.js';

const DEFAULT_PARAMS = {
  categories: '111',
  purity: '100',
  sorting: 'date_added',
  topRange: '1M',
  order: 'desc',
  page: '1',
  q: '',
};

describe('SearchParameters', () => {
  let params: SearchParameters;

  beforeEach(() => {
    params = new SearchParameters();
  });

  // ===========================================================================
  // Defaults
  // ===========================================================================

  describe('defaults', () => {
    it('starts with the documented default mapping', () => {
      expect(params.getParams()).toEqual(DEFAULT_PARAMS);
    });

    it('returns a fresh mapping on every call', () => {
      const first = params.getParams();
      first.q = 'changed';

      expect(params.getParams().q).toBe('');
    });
  });

  // ===========================================================================
  // Masks
  // ===========================================================================

  describe('setCategories', () => {
    it('encodes every flag combination in general, anime, people order', () => {
      const flags = [false, true];
      for (const general of flags) {
        for (const anime of flags) {
          for (const people of flags) {
            params.setCategories(general, anime, people);
            const expected = `${general ? 1 : 0}${anime ? 1 : 0}${people ? 1 : 0}`;
            expect(params.getParams().categories).toBe(expected);
          }
        }
      }
    });

    it('defaults every flag to on', () => {
      params.setCategories(false, false, false).setCategories();
      expect(params.getParams().categories).toBe('111');
    });

    it('accepts an all-off mask', () => {
      params.setCategories(false, false, false);
      expect(params.getParams().categories).toBe('000');
    });
  });

  describe('setPurity', () => {
    it('encodes flags in sfw, sketchy, nsfw order', () => {
      params.setPurity(false, true, true);
      expect(params.getParams().purity).toBe('011');
    });

    it('defaults to sfw only', () => {
      params.setPurity(true, true, true).setPurity();
      expect(params.getParams().purity).toBe('100');
    });

    it('reports whether the nsfw bit needs an API key', () => {
      expect(params.requiresApiKey()).toBe(false);
      params.setPurity(true, false, true);
      expect(params.requiresApiKey()).toBe(true);
    });
  });

  describe('toBitMask', () => {
    it('renders a three character mask', () => {
      expect(toBitMask([true, false, true])).toBe('101');
    });
  });

  // ===========================================================================
  // Enumerations
  // ===========================================================================

  describe('normalizeOption', () => {
    it('lowercases and joins words with underscores', () => {
      expect(normalizeOption('  Date Added ')).toBe('date_added');
      expect(normalizeOption('last-three  days')).toBe('last_three_days');
    });
  });

  describe('setSorting', () => {
    it('accepts names case-insensitively', () => {
      params.setSorting('Date Added');
      expect(params.getParams().sorting).toBe('date_added');

      params.setSorting('TOPLIST');
      expect(params.getParams().sorting).toBe('toplist');
    });

    it('accepts short codes', () => {
      params.setSorting('top');
      expect(params.getParams().sorting).toBe('toplist');

      params.setSorting('fav');
      expect(params.getParams().sorting).toBe('favorites');
    });

    it('rejects unknown sortings with a validation error', () => {
      expect(() => params.setSorting('popularity')).toThrow(ValidationError);
      expect(() => params.setSorting('popularity')).toThrow('Unknown sorting: popularity');
      expect(params.getParams().sorting).toBe('date_added');
    });
  });

  describe('setRange', () => {
    it('maps labels to codes', () => {
      params.setRange('Last Three Days');
      expect(params.getParams().topRange).toBe('3d');

      params.setRange('last_six_months');
      expect(params.getParams().topRange).toBe('6M');
    });

    it('accepts codes regardless of case', () => {
      params.setRange('1w');
      expect(params.getParams().topRange).toBe('1w');

      params.setRange('3m');
      expect(params.getParams().topRange).toBe('3M');
    });

    it('rejects unknown ranges', () => {
      expect(() => params.setRange('2d')).toThrow('Unknown range: 2d');
    });
  });

  describe('setOrder', () => {
    it('accepts asc and desc in any case', () => {
      params.setOrder('ASC');
      expect(params.getParams().order).toBe('asc');

      params.setOrder('Descending');
      expect(params.getParams().order).toBe('desc');
    });

    it('rejects anything else', () => {
      expect(() => params.setOrder('sideways')).toThrow(ValidationError);
    });
  });

  // ===========================================================================
  // Page
  // ===========================================================================

  describe('setPage', () => {
    it('coerces numeric strings', () => {
      params.setPage('3');
      expect(params.getParams().page).toBe('3');
    });

    it('stores numbers as strings', () => {
      params.setPage(12);
      expect(params.getParams().page).toBe('12');
    });

    it.each([0, -2, 1.5, 'abc', ''])('rejects %j', (value) => {
      expect(() => params.setPage(value)).toThrow(ValidationError);
      expect(params.getParams().page).toBe('1');
    });

    it('reports the offending field', () => {
      try {
        params.setPage(0);
        expect.unreachable();
      } catch (err) {
        expect(isWallhavenError(err, 'VALIDATION_ERROR')).toBe(true);
        expect(err).toBeInstanceOf(ValidationError);
        if (err instanceof ValidationError) {
          expect(err.details).toEqual([{ path: '', message: 'Page must be greater than zero' }]);
        }
      }
    });
  });

  // ===========================================================================
  // Query and tokens
  // ===========================================================================

  describe('query and tokens', () => {
    it('replaces the free-text query verbatim', () => {
      params.setSearchQuery('city lights');
      params.setSearchQuery('forest');
      expect(params.getParams().q).toBe('forest');
    });

    it('does not trim the query text', () => {
      params.setSearchQuery('  city lights ');
      expect(params.getParams().q).toBe('  city lights ');
    });

    it('keeps include and exclude tokens in call order', () => {
      params.includeTags(['guitar']).excludeTags(['car']);
      expect(params.getParams().q).toBe('+guitar -car');
    });

    it('keeps call order when excludes come first', () => {
      params.excludeTags(['car']).includeTags(['guitar', 'amp']);
      expect(params.getParams().q).toBe('-car +guitar +amp');
    });

    it('does not de-duplicate tags', () => {
      params.includeTags(['cat']).includeTags(['cat']);
      expect(params.getParams().q).toBe('+cat +cat');
    });

    it('does not double an operator the caller supplied', () => {
      params.includeTags(['+guitar']).excludeTags(['-car']).filterByUser('@someone');
      expect(params.getParams().q).toBe('+guitar -car @someone');
    });

    it('appends the user filter after the query text', () => {
      params.setSearchQuery('space').filterByUser('someone');
      expect(params.getParams().q).toBe('space @someone');
    });

    it('rejects blank tags', () => {
      expect(() => params.includeTags(['  '])).toThrow(ValidationError);
      expect(params.getQueryTokens()).toEqual([]);
    });

    it.each([
      ['includeTags', () => params.includeTags(['+'])],
      ['excludeTags', () => params.excludeTags([' - '])],
      ['filterByUser', () => params.filterByUser('@')],
    ])('%s rejects a bare operator', (_name, add) => {
      expect(add).toThrow(ValidationError);
      expect(params.getParams().q).toBe('');
    });

    it('exposes tokens as structured entries', () => {
      params.includeTags(['guitar']).filterByUser('someone');
      expect(params.getQueryTokens()).toEqual([
        { kind: 'include', value: 'guitar' },
        { kind: 'user', value: 'someone' },
      ]);
    });

    it('clearSearchQuery keeps tokens by default', () => {
      params.setSearchQuery('space').includeTags(['stars']);
      params.clearSearchQuery();
      expect(params.getParams().q).toBe('+stars');
    });

    it('clearSearchQuery drops tokens when asked', () => {
      params.setSearchQuery('space').includeTags(['stars']).filterByUser('someone');
      params.clearSearchQuery(true);
      expect(params.getParams().q).toBe('');
      expect(params.getQueryTokens()).toEqual([]);
    });
  });

  // ===========================================================================
  // Optional filters
  // ===========================================================================

  describe('optional filters', () => {
    it('adds keys only once they are set', () => {
      params
        .setMinimumResolution('1920x1080')
        .setResolutions(['2560x1440', '3840x2160'])
        .setRatios(['16x9', '21x9'])
        .setColor('#660000')
        .setSeed('abc123');

      expect(params.getParams()).toEqual({
        ...DEFAULT_PARAMS,
        atleast: '1920x1080',
        resolutions: '2560x1440,3840x2160',
        ratios: '16x9,21x9',
        colors: '660000',
        seed: 'abc123',
      });
    });

    it('removes filters with null or an empty list', () => {
      params.setMinimumResolution('1920x1080').setRatios(['16x9']).setColor('ABCDEF').setSeed('abc123');
      params.setMinimumResolution(null).setRatios([]).setColor(null).setSeed(null);
      expect(params.getParams()).toEqual(DEFAULT_PARAMS);
    });

    it('normalizes colours to lowercase hex', () => {
      params.setColor('ABCDEF');
      expect(params.getParams().colors).toBe('abcdef');
    });

    it('validates filter values', () => {
      expect(() => params.setMinimumResolution('wide')).toThrow(ValidationError);
      expect(() => params.setResolutions(['1920*1080'])).toThrow(ValidationError);
      expect(() => params.setColor('#12345')).toThrow(ValidationError);
      expect(() => params.setSeed('abc')).toThrow(ValidationError);
    });
  });

  // ===========================================================================
  // Resets
  // ===========================================================================

  describe('resetParameters', () => {
    it('restores the default mapping after arbitrary changes', () => {
      params
        .setCategories(false, true, false)
        .setPurity(false, true, false)
        .setSorting('views')
        .setRange('1y')
        .setOrder('asc')
        .setPage(7)
        .setSearchQuery('ocean')
        .includeTags(['waves'])
        .excludeTags(['boats'])
        .filterByUser('someone')
        .setRatios(['16x9'])
        .setSeed('abc123');

      params.resetParameters();

      expect(params.getParams()).toEqual(DEFAULT_PARAMS);
      expect(params.getQueryTokens()).toEqual([]);
    });
  });

  describe('resetFilters', () => {
    it('clears q but leaves the other fields alone', () => {
      params
        .setCategories(true, false, false)
        .setPurity(true, true, false)
        .setSorting('random')
        .setOrder('asc')
        .setPage(4)
        .setSearchQuery('ocean')
        .includeTags(['waves'])
        .filterByUser('someone');

      params.resetFilters();

      expect(params.getParams()).toEqual({
        categories: '100',
        purity: '110',
        sorting: 'random',
        topRange: '1M',
        order: 'asc',
        page: '4',
        q: '',
      });
    });
  });
});
