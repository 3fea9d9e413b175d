import { describe, it, expect } from 'vitest';
import { displayRegion, isCarAlias, isNcrAlias, matchesRegionPattern, regionPatterns } from '../regions';
import { displayMunicipality, normalizeLguText, stripDiacritics, titleCase } from '../placeNames';

describe('regions', () => {
  describe('regionPatterns', () => {
    it('expands digits to roman numerals', () => {
      expect(regionPatterns('2')).toEqual(['region ii', 'region 2']);
    });

    it('expands roman numerals to digits', () => {
      expect(regionPatterns('Region VII')).toEqual(['region vii', 'region 7']);
    });

    it('expands region 4 to both sub-regions', () => {
      expect(regionPatterns('4')).toEqual([
        'region iv', 'region 4',
        'region iv-a', 'region iv-b', 'region 4-a', 'region 4-b', 'calabarzon', 'mimaropa',
      ]);
    });

    it('expands a sub-region only to itself', () => {
      expect(regionPatterns('Region IV-A')).toEqual(['region iv-a', 'region 4-a', 'calabarzon']);
    });

    it('expands NCR aliases', () => {
      expect(regionPatterns('NCR')).toEqual(['ncr', 'national capital region', 'metro manila', 'metropolitan manila']);
    });
  });

  describe('matchesRegionPattern', () => {
    it('matches prefix patterns at a word boundary', () => {
      expect(matchesRegionPattern('Region II', 'region ii')).toBe(true);
      expect(matchesRegionPattern('Region II', 'region i')).toBe(false);
      expect(matchesRegionPattern('Region IV-A', 'region iv')).toBe(true);
    });

    it('matches alias patterns against the whole cell', () => {
      expect(matchesRegionPattern(' NCR ', 'ncr')).toBe(true);
      expect(matchesRegionPattern('NCR South', 'ncr')).toBe(false);
    });
  });

  it('recognises aliases', () => {
    expect(isNcrAlias('Metro Manila')).toBe(true);
    expect(isCarAlias('Cordillera')).toBe(true);
    expect(isNcrAlias('Manila')).toBe(false);
  });

  it('renders region labels', () => {
    expect(displayRegion('2')).toBe('Region II');
    expect(displayRegion('iv-a')).toBe('Region IV-A');
    expect(displayRegion('Region XI')).toBe('Region XI');
    expect(displayRegion('National Capital Region')).toBe('NCR');
    expect(displayRegion('Cordillera Administrative Region')).toBe('CAR');
    expect(displayRegion('Davao Region')).toBe('Davao Region');
  });
});

describe('placeNames', () => {
  it('normalizes LGU text', () => {
    expect(normalizeLguText('CITY OF PARAÑAQUE')).toBe('paranaque');
    expect(normalizeLguText('Tuguegarao City')).toBe('tuguegarao');
    expect(normalizeLguText('Municipality of San-Jose')).toBe('san jose');
  });

  it('strips diacritics', () => {
    expect(stripDiacritics('Las Piñas')).toBe('Las Pinas');
  });

  it('title-cases names', () => {
    expect(titleCase('SAN JOSE DEL MONTE')).toBe('San Jose Del Monte');
  });

  it('renders municipalities for display', () => {
    expect(displayMunicipality('CITY OF PARAÑAQUE, METROPOLITAN MANILA')).toBe('Parañaque City, Metro Manila');
    expect(displayMunicipality('TUGUEGARAO CITY')).toBe('Tuguegarao City');
    expect(displayMunicipality('CITY OF ILAGAN')).toBe('Ilagan City');
  });
});
