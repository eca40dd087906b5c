/**
 * Unit tests for row normalization.
 */

import { describe, expect, it } from 'vitest';

import { revenueCategoryName } from '@/modules/categories/index.js';
import {
  isRecord,
  toAmount,
  toCountySummary,
  toDebtDetails,
  toEntityDetail,
  toEntitySummary,
  toIsoDate,
  toLineItem,
  toNumberOrNull,
  toPeerEntity,
  toPensionSystems,
  toText,
} from '@/modules/fiscal/shell/repo/normalize.js';

import { makeDebtDetails } from '../../fixtures/builders.js';

describe('scalars', () => {
  it('parses numbers, bigints and numeric strings', () => {
    expect(toNumberOrNull(5)).toBe(5);
    expect(toNumberOrNull(10n)).toBe(10);
    expect(toNumberOrNull('12.5')).toBe(12.5);
    expect(toNumberOrNull(' 7 ')).toBe(7);
  });

  it('returns null for anything else', () => {
    expect(toNumberOrNull(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toNumberOrNull('   ')).toBeNull();
    expect(toNumberOrNull('abc')).toBeNull();
    expect(toNumberOrNull(null)).toBeNull();
    expect(toNumberOrNull(undefined)).toBeNull();
  });

  it('treats missing amounts as zero', () => {
    expect(toAmount(null)).toBe(0);
    expect(toAmount('1500.25')).toBe(1500.25);
  });

  it('formats dates as YYYY-MM-DD', () => {
    expect(toIsoDate(new Date(2023, 11, 31))).toBe('2023-12-31');
    expect(toIsoDate('2023-12-31T00:00:00Z')).toBe('2023-12-31');
    expect(toIsoDate('Dec 2023')).toBe('Dec 2023');
    expect(toIsoDate(new Date(Number.NaN))).toBeNull();
    expect(toIsoDate(null)).toBeNull();
  });

  it('decodes text values', () => {
    expect(toText('Cook')).toBe('Cook');
    expect(toText(32)).toBe('32');
    expect(toText(Buffer.from('Kane', 'utf8'))).toBe('Kane');
    expect(toText(null)).toBeNull();
  });

  it('recognizes row objects', () => {
    expect(isRecord({ Code: '016/020/32' })).toBe(true);
    expect(isRecord(['016/020/32'])).toBe(false);
    expect(isRecord(null)).toBe(false);
  });
});

describe('toEntityDetail', () => {
  it('keeps unknown statistics as null', () => {
    const entity = toEntityDetail({
      Code: '022/010/32',
      UnitName: 'Village of Nostats',
      EntityType: 'Village',
      EntityTypeCode: '32',
      County: 'DuPage',
      Population: null,
      EquitalizedAssessedValue: null,
    });

    expect(entity.Population).toBeNull();
    expect(entity.EquitalizedAssessedValue).toBeNull();
    expect(entity.FullTimeEmployees).toBeNull();
    expect(entity.HomeRule).toBeNull();
    expect(entity.CEOFName).toBeNull();
  });

  it('names the type from its code when the description is missing', () => {
    const entity = toEntityDetail({ Code: '045/001/01', EntityType: null, EntityTypeCode: '1' });

    expect(entity.EntityType).toBe('Township');
    expect(entity.EntityTypeCode).toBe('1');
  });

  it('prefers the stored description over the type code', () => {
    const entity = toEntityDetail({
      Code: '045/001/01',
      EntityType: 'Road District',
      EntityTypeCode: '1',
    });

    expect(entity.EntityType).toBe('Road District');
  });

  it('parses warehouse numerics', () => {
    const entity = toEntityDetail({ Code: '016/020/32', Population: '1000', EquitalizedAssessedValue: '500000000.00' });
    expect(entity.Population).toBe(1000);
    expect(entity.EquitalizedAssessedValue).toBe(500_000_000);
  });
});

describe('toEntitySummary', () => {
  it('falls back to the type code for a blank description', () => {
    const summary = toEntitySummary({
      Code: '045/001/01',
      UnitName: 'Batavia Township',
      EntityType: ' ',
      EntityTypeCode: '1',
      County: 'Kane',
    });

    expect(summary).toEqual({
      Code: '045/001/01',
      UnitName: 'Batavia Township',
      EntityType: 'Township',
      County: 'Kane',
    });
  });

  it('keeps a null type when neither column is set', () => {
    const summary = toEntitySummary({ Code: '045/001/01', EntityType: null, EntityTypeCode: null });

    expect(summary.EntityType).toBeNull();
  });
});

describe('toLineItem', () => {
  it('maps fund columns, totals them and names the category', () => {
    const item = toLineItem(
      { Category: '201t', GN: '1000.10', SR: 200, CP: null },
      revenueCategoryName
    );

    expect(item).toEqual({
      Category: '201t',
      GeneralFund: 1000.1,
      SpecialRevenue: 200,
      CapitalProjects: 0,
      DebtService: 0,
      Enterprise: 0,
      Trust: 0,
      Fiduciary: 0,
      DebtPrincipal: 0,
      Total: 1200.1,
      CategoryName: 'Property Taxes',
    });
  });

  it('falls back to the code for unknown categories', () => {
    expect(toLineItem({ Category: '999t', TS: 5 }, revenueCategoryName).CategoryName).toBe('999t');
  });
});

describe('toDebtDetails', () => {
  it('returns zeros without a debt row', () => {
    expect(toDebtDetails(undefined)).toEqual(makeDebtDetails());
  });

  it('combines the paired schedule columns per debt type', () => {
    const details = toDebtDetails({
      a400: '500',
      a401: 1000,
      a406: 50,
      a407: 200,
      a412: 1,
      a413: 100,
      e400: 7,
      t404: '1500000',
      t410: null,
    });

    expect(details).toEqual(
      makeDebtDetails({
        GOBonds_Beginning: 1500,
        GOBonds_Additions: 250,
        GOBonds_Retirements: 101,
        OtherDebt_Beginning: 7,
        TotalDebt_Ending_LongTerm: 1_500_000,
      })
    );
  });
});

describe('toPensionSystems', () => {
  it('returns no systems without a pension row', () => {
    expect(toPensionSystems(undefined)).toEqual({});
  });

  it('keeps only systems with a positive total liability', () => {
    const systems = toPensionSystems({
      IMRF_t500_3: new Date(2023, 11, 31),
      IMRF_t501_3: '1000000',
      IMRF_t502_3: '800000',
      IMRF_t503_3: '200000',
      IMRF_t504_3: '80.00',
      Police_t501_3: null,
      Fire_t500_3: '2023-12-31',
      Fire_t501_3: 0,
    });

    expect(systems).toEqual({
      IMRF: {
        measurement_date: '2023-12-31',
        total_liability: 1_000_000,
        plan_assets: 800_000,
        net_position: 200_000,
        funded_ratio: 80,
      },
    });
  });
});

describe('aggregates', () => {
  it('computes the population difference for peers', () => {
    const peer = toPeerEntity(
      { Code: '016/031/32', UnitName: 'Village of Beta', EntityType: 'Village', County: 'Cook', Population: '750' },
      1000
    );
    expect(peer.Population).toBe(750);
    expect(peer.PopulationDifference).toBe(250);
  });

  it('parses bigint count strings in county summaries', () => {
    const summary = toCountySummary({
      County: 'Cook',
      EntityCount: '5',
      EntityTypeCount: '2',
      TotalPopulation: '4750',
      TotalEAV: '500003000',
      TotalFullTimeEmployees: 300,
      TotalPartTimeEmployees: 50,
      HomeRuleCount: '2',
      EntitiesWithDebt: null,
    });

    expect(summary).toEqual({
      County: 'Cook',
      EntityCount: 5,
      EntityTypeCount: 2,
      TotalPopulation: 4750,
      TotalEAV: 500_003_000,
      TotalFullTimeEmployees: 300,
      TotalPartTimeEmployees: 50,
      HomeRuleCount: 2,
      EntitiesWithDebt: 0,
    });
  });
});
