/**
 * SQL renderer for WhereClause trees.
 *
 * Renders a filter tree to a parameterized SQL condition. Values never appear
 * in the SQL text; they are collected in `params` in placeholder order.
 */

import {WhereClause, type QueryFilter} from "./where-clause.js";
import {ErrInvalidFilterValue} from "./errors/basic-errors.js";

export type FieldMapper = (field: string) => string;

export interface SqlFilterResult {
  sql: string;
  params: unknown[];
}

/** Default field mapper: ANSI double-quoted identifier. */
export const quotedIdentifierMapper: FieldMapper = (field: string) =>
  `"${field.replace(/"/g, '""')}"`;

export class SqlWhereRenderer {
  private fieldMapper: FieldMapper;

  constructor(fieldMapper: FieldMapper = quotedIdentifierMapper) {
    this.fieldMapper = fieldMapper;
  }

  render(where: WhereClause): SqlFilterResult {
    if (WhereClause.isLeaf(where)) {
      return this.renderComparison(where);
    }

    if (where.clauses.length === 0) {
      // Empty AND matches everything, empty OR matches nothing
      return { sql: where.kind === 'and' ? '1 = 1' : '1 = 0', params: [] };
    }

    const parts = where.clauses.map((clause) => this.render(clause));
    if (parts.length === 1) {
      return parts[0];
    }

    const joiner = where.kind === 'and' ? ' AND ' : ' OR ';
    return {
      sql: parts.map((p) => `(${p.sql})`).join(joiner),
      params: parts.flatMap((p) => p.params),
    };
  }

  private renderComparison(filter: QueryFilter): SqlFilterResult {
    const sqlField = this.fieldMapper(filter.field);

    switch (filter.op) {
      case '=':
        return { sql: `${sqlField} = ?`, params: [filter.value] };
      case '!=':
        return { sql: `${sqlField} != ?`, params: [filter.value] };
      case '>':
        return { sql: `${sqlField} > ?`, params: [filter.value] };
      case '<':
        return { sql: `${sqlField} < ?`, params: [filter.value] };
      case 'like':
        return { sql: `${sqlField} LIKE ?`, params: [filter.value] };
      case 'in': {
        const values = filter.value;
        if (!Array.isArray(values) || values.length === 0) {
          throw ErrInvalidFilterValue.create({ field: filter.field, op: filter.op, expected: 'a non-empty list' });
        }
        const placeholders = values.map(() => '?').join(', ');
        return { sql: `${sqlField} IN (${placeholders})`, params: [...values] };
      }
    }
  }
}
