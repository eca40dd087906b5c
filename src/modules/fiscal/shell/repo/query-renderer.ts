/**
 * Query Renderer
 *
 * Compiles a QuerySpec into a parameterized CompiledQuery for one backend.
 * Both backends share the builder; they differ in the dialect compiler Kysely
 * was created with and in their DialectTraits.
 */

import { sql, type CompiledQuery, type RawBuilder, type SqlBool } from 'kysely';

import { equalsInsensitive, type DialectTraits } from './dialect-traits.js';
import { escapeLikePattern, type LineItemTableName, type QuerySpec } from './query-spec.js';

import type { RankMetric } from '../../core/types.js';
import type { FiscalDbClient } from '@/infra/database/client.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface QueryRenderer {
  render(spec: QuerySpec): CompiledQuery<unknown>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const LINE_ITEM_COLUMNS = ['Category', 'GN', 'SR', 'CP', 'DS', 'EP', 'TS', 'FD', 'DP'] as const;

// Unknown populations sort after known ones in both engines
const POPULATION_NULLS_LAST = sql`case when ${sql.ref('us.Pop')} is null then 1 else 0 end`;

const metricExpression = (metric: RankMetric): RawBuilder<unknown> => {
  switch (metric) {
    case 'population':
      return sql.ref('us.Pop');
    case 'eav':
      return sql.ref('us.EAV');
    case 'employees':
      return sql`coalesce(${sql.ref('us.FULL_EMP')}, 0) + coalesce(${sql.ref('us.PART_EMP')}, 0)`;
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Renderer Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a renderer bound to a Kysely instance (for its dialect compiler).
 *
 * @param db - Kysely instance of the active backend; never executed here
 * @param traits - Backend-specific fragments
 * @param schema - Optional schema qualifying every table (warehouse)
 */
export const makeQueryRenderer = (
  db: FiscalDbClient,
  traits: DialectTraits,
  schema?: string
): QueryRenderer => {
  const qdb = schema === undefined ? db : db.withSchema(schema);

  // Raw statements are not rewritten by withSchema, so they qualify tables themselves
  const tableRef = (table: LineItemTableName) =>
    sql.table(schema === undefined ? table : `${schema}.${table}`);

  const render = (spec: QuerySpec): CompiledQuery<unknown> => {
    switch (spec.op) {
      case 'searchEntities': {
        const escaped = escapeLikePattern(spec.term);
        const contains = `%${escaped}%`;
        return qdb
          .selectFrom('UnitData')
          .select(['Code', 'UnitName', 'Description as EntityType', 'C4 as EntityTypeCode', 'County'])
          .where((eb) =>
            eb.or([
              traits.likeInsensitive(eb.ref('UnitName'), contains),
              traits.likeInsensitive(eb.ref('County'), contains),
            ])
          )
          .orderBy(
            sql`case when lower(${sql.ref('UnitName')}) = lower(${spec.term}) then 0 when ${traits.likeInsensitive(sql.ref('UnitName'), `${escaped}%`)} then 1 else 2 end`
          )
          .orderBy('UnitName')
          .orderBy('Code')
          .limit(spec.limit)
          .compile();
      }

      case 'getEntity':
        return qdb
          .selectFrom('UnitData as ud')
          .leftJoin('UnitStats as us', 'us.Code', 'ud.Code')
          .select([
            'ud.Code',
            'ud.UnitName',
            'ud.Description as EntityType',
            'ud.C4 as EntityTypeCode',
            'ud.County',
            'ud.CEOFName',
            'ud.CEOLName',
            'ud.CEOTitle',
            'ud.CFOFName',
            'ud.CFOLName',
            'ud.CFOTitle',
            'us.Pop as Population',
            'us.EAV as EquitalizedAssessedValue',
            'us.FULL_EMP as FullTimeEmployees',
            'us.PART_EMP as PartTimeEmployees',
            'us.HomeRule',
            'us.Debt as HasDebt',
            'us.BondedDebt as HasBondedDebt',
          ])
          .where('ud.Code', '=', spec.code)
          .limit(1)
          .compile();

      case 'getLineItems':
        return sql`select ${sql.join(LINE_ITEM_COLUMNS.map((column) => sql.ref(column)))} from ${tableRef(spec.table)} where ${sql.ref('Code')} = ${spec.code} order by ${sql.ref('Category')}`.compile(
          db
        );

      case 'getDebt':
        return qdb.selectFrom('Indebtedness').selectAll().where('Code', '=', spec.code).compile();

      case 'getPensions':
        return qdb.selectFrom('Pensions').selectAll().where('Code', '=', spec.code).compile();

      case 'getEntitiesByCounty': {
        let query = qdb
          .selectFrom('UnitData as ud')
          .leftJoin('UnitStats as us', 'us.Code', 'ud.Code')
          .select([
            'ud.Code',
            'ud.UnitName',
            'ud.Description as EntityType',
            'us.Pop as Population',
            'us.EAV as EquitalizedAssessedValue',
          ])
          .where(equalsInsensitive(sql.ref('ud.County'), spec.county));

        if (spec.entityType !== undefined) {
          query = query.where(equalsInsensitive(sql.ref('ud.Description'), spec.entityType));
        }

        return query
          .orderBy(POPULATION_NULLS_LAST)
          .orderBy('us.Pop', 'desc')
          .orderBy('ud.UnitName')
          .orderBy('ud.Code')
          .compile();
      }

      case 'getPeerEntities': {
        let query = qdb
          .selectFrom('UnitData as ud')
          .innerJoin('UnitStats as us', 'us.Code', 'ud.Code')
          .select([
            'ud.Code',
            'ud.UnitName',
            'ud.Description as EntityType',
            'ud.County',
            'us.Pop as Population',
          ])
          .where('us.Pop', '>=', spec.minPopulation)
          .where('us.Pop', '<=', spec.maxPopulation)
          .where('ud.Code', '<>', spec.code);

        if (spec.typeFilter?.column === 'code') {
          query = query.where('ud.C4', '=', spec.typeFilter.value);
        } else if (spec.typeFilter?.column === 'label') {
          query = query.where(equalsInsensitive(sql.ref('ud.Description'), spec.typeFilter.value));
        }

        return query
          .orderBy(sql`abs(${sql.ref('us.Pop')} - ${spec.targetPopulation})`)
          .orderBy('ud.Code')
          .limit(spec.limit)
          .compile();
      }

      case 'rankEntities': {
        const metric = metricExpression(spec.metric);
        let query = qdb
          .selectFrom('UnitData as ud')
          .leftJoin('UnitStats as us', 'us.Code', 'ud.Code')
          .select([
            'ud.Code',
            'ud.UnitName',
            'ud.Description as EntityType',
            'ud.County',
            metric.as('MetricValue'),
          ])
          .where(sql<SqlBool>`${metric} is not null`);

        if (spec.entityType !== undefined) {
          query = query.where(equalsInsensitive(sql.ref('ud.Description'), spec.entityType));
        }
        if (spec.county !== undefined) {
          query = query.where(equalsInsensitive(sql.ref('ud.County'), spec.county));
        }

        return query
          .orderBy(metric, spec.order === 'top' ? 'desc' : 'asc')
          .orderBy('ud.Code')
          .limit(spec.limit)
          .compile();
      }

      case 'getCountySummary':
        return qdb
          .selectFrom('UnitData as ud')
          .leftJoin('UnitStats as us', 'us.Code', 'ud.Code')
          .select([
            sql<string>`max(${sql.ref('ud.County')})`.as('County'),
            sql<number>`count(distinct ${sql.ref('ud.Code')})`.as('EntityCount'),
            sql<number>`count(distinct ${sql.ref('ud.Description')})`.as('EntityTypeCount'),
            sql<number>`coalesce(sum(${sql.ref('us.Pop')}), 0)`.as('TotalPopulation'),
            sql<number>`coalesce(sum(${sql.ref('us.EAV')}), 0)`.as('TotalEAV'),
            sql<number>`coalesce(sum(${sql.ref('us.FULL_EMP')}), 0)`.as('TotalFullTimeEmployees'),
            sql<number>`coalesce(sum(${sql.ref('us.PART_EMP')}), 0)`.as('TotalPartTimeEmployees'),
            sql<number>`sum(case when ${sql.ref('us.HomeRule')} = 'Y' then 1 else 0 end)`.as(
              'HomeRuleCount'
            ),
            sql<number>`sum(case when ${sql.ref('us.Debt')} = 'Y' then 1 else 0 end)`.as(
              'EntitiesWithDebt'
            ),
          ])
          .where(equalsInsensitive(sql.ref('ud.County'), spec.county))
          .groupBy(sql`lower(${sql.ref('ud.County')})`)
          .compile();

      case 'countEntities':
        return qdb
          .selectFrom('UnitData')
          .select((eb) => eb.fn.countAll().as('EntityCount'))
          .compile();
    }
  };

  return { render };
};
