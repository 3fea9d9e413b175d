import { describe, it, expect } from 'vitest';
import { detectFilters, hasPlaceFilter } from '../filterDetector';
import { fixtureDataset } from '../../../test/fixtures/dataset';

describe('detectFilters', () => {
  const dataset = fixtureDataset();

  describe('regions', () => {
    it('detects numbered regions', () => {
      expect(detectFilters('projects in Region 2', dataset)).toEqual({ region: '2' });
      expect(detectFilters('list projects in region ii', dataset)).toEqual({ region: 'ii' });
    });

    it('detects NCR aliases', () => {
      expect(detectFilters('how many projects in NCR', dataset)).toEqual({ region: 'National Capital Region' });
      expect(detectFilters('total budget in Metro Manila', dataset)).toEqual({ region: 'National Capital Region' });
    });

    it('detects sub-regions', () => {
      expect(detectFilters('projects in Region IV-A', dataset)).toEqual({ region: 'iv-a' });
    });
  });

  describe('Davao', () => {
    it('reads "Davao City" as the city', () => {
      expect(detectFilters('projects in Davao City', dataset)).toEqual({ municipality: 'Davao City' });
    });

    it('reads a Davao province', () => {
      expect(detectFilters('projects in Davao del Sur', dataset)).toEqual({ province: 'Davao Del Sur' });
    });

    it('reads bare Davao as the region', () => {
      expect(detectFilters('projects in davao', dataset)).toEqual({ region: 'Davao Region' });
    });
  });

  it('detects main islands', () => {
    expect(detectFilters('total budget in Visayas', dataset)).toEqual({ main_island: 'visayas' });
  });

  describe('municipalities', () => {
    it('resolves "<name> City" against the dataset', () => {
      expect(detectFilters('How many projects in Tuguegarao City', dataset)).toEqual({ municipality: 'TUGUEGARAO CITY' });
    });

    it('resolves a name without the city prefix and picks up the province', () => {
      expect(detectFilters('projects in Ilagan City Isabela', dataset)).toEqual({
        municipality: 'CITY OF ILAGAN',
        province: 'ISABELA',
      });
    });
  });

  it('detects provinces', () => {
    expect(detectFilters('total budget in Isabela', dataset)).toEqual({ province: 'ISABELA' });
  });

  it('detects multiple locations', () => {
    expect(detectFilters('total budget in Tuguegarao City or Cebu City', dataset)).toEqual({
      multi_locations: ['TUGUEGARAO CITY', 'CEBU CITY'],
    });
  });

  it('returns no filters for questions without a place', () => {
    expect(detectFilters('total budget', dataset)).toEqual({});
  });

  it('reports whether the filters name a place', () => {
    expect(hasPlaceFilter({ region: '2' })).toBe(true);
    expect(hasPlaceFilter({ multi_locations: [] })).toBe(false);
    expect(hasPlaceFilter({ contractor: 'ALPHA BUILDERS' })).toBe(false);
  });
});
