/**
 * Unit tests for the fiscal facade: envelopes, status codes and logging.
 */

import { describe, expect, it } from 'vitest';

import { FUND_TYPE_LEGEND } from '@/modules/categories/index.js';
import { createDatabaseError } from '@/modules/fiscal/core/errors.js';
import { BACKEND_FAILURE_MESSAGE } from '@/modules/fiscal/shell/facade/envelope.js';
import { makeFiscalFacade, type FiscalFacade } from '@/modules/fiscal/shell/facade/fiscal-facade.js';

import { makeFakeFiscalRepo, makeRecordingLogger, type FakeFiscalRepoOptions } from '../../fixtures/fakes.js';
import { makeFiscalData } from '../../fixtures/fiscal-entities.js';

const NOW = new Date('2024-01-01T00:00:00.000Z');

const setup = (options: FakeFiscalRepoOptions = {}): { facade: FiscalFacade; lines: unknown[] } => {
  const { logger, lines } = makeRecordingLogger();
  const facade = makeFiscalFacade({
    fiscalRepo: makeFakeFiscalRepo(makeFiscalData(), options),
    logger,
    dataSource: { kind: 'file', location: './data/fiscal.sqlite' },
    connectionTested: true,
    version: '1.0.0-test',
    now: () => NOW,
  });
  return { facade, lines };
};

describe('makeFiscalFacade', () => {
  describe('health and tables', () => {
    it('reports the configured data source', () => {
      const { facade } = setup();

      expect(facade.health()).toEqual({
        httpStatus: 200,
        body: {
          status: 'healthy',
          data_source: 'file',
          database_path: './data/fiscal.sqlite',
          connection_tested: true,
          version: '1.0.0-test',
          timestamp: '2024-01-01T00:00:00.000Z',
        },
      });
    });

    it('lists the fiscal tables', () => {
      const { facade } = setup();

      expect(facade.tables()).toEqual({
        httpStatus: 200,
        body: {
          status: 'success',
          data_source: 'file',
          tables: [
            'UnitData',
            'UnitStats',
            'Revenues',
            'Expenditures',
            'FundBalances',
            'Indebtedness',
            'Pensions',
          ],
        },
      });
    });
  });

  describe('search', () => {
    it('wraps matches in a success envelope', async () => {
      const { facade } = setup();

      expect(await facade.search({ term: 'Skokie' })).toEqual({
        httpStatus: 200,
        body: {
          status: 'success',
          count: 1,
          entities: [
            { Code: '016/020/32', UnitName: 'Village of Skokie', EntityType: 'Village', County: 'Cook' },
          ],
        },
      });
    });

    it('returns not_found with 200 when nothing matches', async () => {
      const { facade } = setup();

      expect(await facade.search({ term: ' zz-no-such-place ' })).toEqual({
        httpStatus: 200,
        body: { status: 'not_found', message: "No entities found matching 'zz-no-such-place'" },
      });
    });

    it('returns 400 for a short term', async () => {
      const { facade, lines } = setup();

      expect(await facade.search({ term: 'a' })).toEqual({
        httpStatus: 400,
        body: { status: 'error', error_message: 'Search term must be at least 2 characters' },
      });
      expect(lines).toEqual([]);
    });
  });

  describe('entity resources', () => {
    it('returns 404 for an unknown entity', async () => {
      const { facade } = setup();

      expect(await facade.entity('999/999/99')).toEqual({
        httpStatus: 404,
        body: { status: 'error', error_message: "Entity with code '999/999/99' not found" },
      });
    });

    it('returns 404 for every sub-resource of an unknown entity', async () => {
      const { facade } = setup();
      const notFound = {
        httpStatus: 404,
        body: { status: 'error', error_message: "Entity with code '999/999/99' not found" },
      };

      expect(await facade.revenues('999/999/99')).toEqual(notFound);
      expect(await facade.expenditures('999/999/99')).toEqual(notFound);
      expect(await facade.fundBalances('999/999/99')).toEqual(notFound);
      expect(await facade.debt('999/999/99')).toEqual(notFound);
      expect(await facade.pensions('999/999/99')).toEqual(notFound);
    });

    it('carries the fund type legend with revenues', async () => {
      const { facade } = setup();
      const response = await facade.revenues('016/020/32');

      expect(response.httpStatus).toBe(200);
      expect(response.body).toMatchObject({
        status: 'success',
        code: '016/020/32',
        total_revenue: 1550.75,
        fund_type_legend: FUND_TYPE_LEGEND,
      });
    });

    it('names the expenditure total', async () => {
      const { facade } = setup();

      expect((await facade.expenditures('016/020/32')).body).toMatchObject({
        status: 'success',
        total_expenditure: 1400,
      });
    });

    it('carries category descriptions with fund balances', async () => {
      const { facade } = setup();
      const response = await facade.fundBalances('016/020/32');

      expect(response.body).toMatchObject({
        status: 'success',
        category_descriptions: { '307t': 'Unassigned' },
      });
    });

    it('reports total debt with debt type descriptions', async () => {
      const { facade } = setup();

      expect((await facade.debt('016/020/32')).body).toMatchObject({
        status: 'success',
        total_debt: 2_000_000,
        debt_type_descriptions: {
          GOBonds: 'General Obligation Bonds - backed by full faith and credit',
        },
      });
    });

    it('carries the funded ratio thresholds with pensions', async () => {
      const { facade } = setup();

      expect((await facade.pensions('016/020/32')).body).toMatchObject({
        status: 'success',
        funded_ratio_thresholds: { excellent: 0.8, good: 0.6, fair: 0.4, critical: 0 },
      });
    });

    it('returns the fiscal health report as the payload', async () => {
      const { facade } = setup();

      expect((await facade.fiscalHealth('016/020/32')).body).toMatchObject({
        status: 'success',
        entity_code: '016/020/32',
        metrics: { debt_per_capita: { value: 2000, unit: 'dollars', rating: 'Moderate' } },
      });
    });

    it('counts peers', async () => {
      const { facade } = setup();

      expect((await facade.peers({ code: '016/020/32', sameType: false })).body).toMatchObject({
        status: 'success',
        entity_code: '016/020/32',
        peer_count: 2,
      });
    });
  });

  describe('collections', () => {
    it('reports compared and unresolved codes', async () => {
      const { facade } = setup();

      expect((await facade.compare({ codes: '016/020/32,999/999/99,016/032/32' })).body).toMatchObject({
        status: 'success',
        entity_count: 2,
        unresolved_codes: ['999/999/99'],
      });
    });

    it('echoes ranking filters as null when absent', async () => {
      const { facade } = setup();

      expect((await facade.rank({ metric: 'eav', order: 'bottom', limit: 2 })).body).toMatchObject({
        status: 'success',
        metric: 'eav',
        order: 'bottom',
        filters: { entity_type: null, county: null },
        count: 2,
      });
    });

    it('echoes the county entity filter', async () => {
      const { facade } = setup();

      expect(
        (await facade.countyEntities({ county: 'Cook', entityType: 'Village' })).body
      ).toMatchObject({
        status: 'success',
        county: 'Cook',
        entity_type_filter: 'Village',
        count: 2,
      });
    });

    it('returns 404 for an unknown county summary', async () => {
      const { facade } = setup();

      expect(await facade.countySummary('Nowhere')).toEqual({
        httpStatus: 404,
        body: { status: 'error', error_message: "County 'Nowhere' not found" },
      });
    });
  });

  describe('repeated calls', () => {
    it('returns equal responses for identical calls', async () => {
      const { facade } = setup();
      const calls = [
        () => facade.search({ term: 'Village' }),
        () => facade.entity('016/020/32'),
        () => facade.revenues('016/020/32'),
        () => facade.expenditures('016/020/32'),
        () => facade.fundBalances('016/020/32'),
        () => facade.debt('016/020/32'),
        () => facade.pensions('016/020/32'),
        () => facade.fiscalHealth('016/020/32'),
        () => facade.peers({ code: '016/020/32', sameType: false }),
        () => facade.compare({ codes: '016/020/32,016/032/32' }),
        () => facade.rank({ metric: 'population', order: 'top', limit: 5 }),
        () => facade.countyEntities({ county: 'Cook' }),
        () => facade.countySummary('Cook'),
      ];

      for (const call of calls) {
        expect(await call()).toEqual(await call());
      }
    });
  });

  describe('backend failures', () => {
    it('hides the cause from the caller and logs it', async () => {
      const { facade, lines } = setup({
        failWith: createDatabaseError('getEntity', 'select * from "UnitData"', new Error('disk I/O error')),
      });

      expect(await facade.entity('016/020/32')).toEqual({
        httpStatus: 500,
        body: { status: 'error', error_message: BACKEND_FAILURE_MESSAGE },
      });
      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatchObject({
        level: 50,
        msg: 'Fiscal getEntity failed',
        operation: 'getEntity',
        query: 'select * from "UnitData"',
        err: { message: 'disk I/O error' },
      });
    });
  });
});
