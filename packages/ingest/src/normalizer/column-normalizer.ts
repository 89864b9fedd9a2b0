import { MissingColumnError, REQUIRED_COLUMNS, type StagedRow, type StagedTable } from '@ledgerline/types';
import { COLUMN_SYNONYMS, normalizeLabel, type ColumnRole, type SynonymRule } from '../rules.js';
import { formatStagedAmount, parseNumeric } from '../parsers/numeric-parser.js';

const CURRENCY_ANNOTATION = /\s*\([^)]*\)\s*$/;

export interface RoleAssignment {
  /** Winning source column per role. */
  winners: ReadonlyMap<ColumnRole, string>;
  /** Columns that matched a role another column already holds. */
  contested: { column: string; role: ColumnRole; winner: string }[];
}

export interface ColumnNormalization {
  table: StagedTable;
  warnings: string[];
  /** Source labels as they arrived, for error reporting. */
  sourceColumns: string[];
}

/** Drop a trailing parenthesised note such as `(₦)` or `(NGN)`. */
export function stripCurrencyAnnotation(label: string): string {
  return label.replace(CURRENCY_ANNOTATION, '').trim();
}

export function lookupRole(label: string): SynonymRule | null {
  const key = normalizeLabel(label);
  const direct = COLUMN_SYNONYMS.get(key);
  if (direct !== undefined) return direct;

  const stripped = normalizeLabel(stripCurrencyAnnotation(label));
  if (stripped === key || stripped.length === 0) return null;
  return COLUMN_SYNONYMS.get(stripped) ?? null;
}

/**
 * Decide which column plays each role. When several columns match one role,
 * the synonym listed first wins, then the leftmost column.
 */
export function assignRoles(columns: readonly string[]): RoleAssignment {
  const best = new Map<ColumnRole, { column: string; rank: number }>();
  const matched: { column: string; rule: SynonymRule }[] = [];

  for (const column of columns) {
    const rule = lookupRole(column);
    if (rule === null) continue;
    matched.push({ column, rule });
    const current = best.get(rule.role);
    if (current === undefined || rule.rank < current.rank) {
      best.set(rule.role, { column, rank: rule.rank });
    }
  }

  const winners = new Map<ColumnRole, string>();
  for (const [role, entry] of best) winners.set(role, entry.column);

  const contested: RoleAssignment['contested'] = [];
  for (const { column, rule } of matched) {
    const winner = winners.get(rule.role);
    if (winner !== undefined && winner !== column) {
      contested.push({ column, role: rule.role, winner });
    }
  }

  return { winners, contested };
}

/** Source column holding `role` in a staged table, if any. */
export function locateColumn(table: Pick<StagedTable, 'columns'>, role: ColumnRole): string | undefined {
  if (table.columns.includes(role)) return role;
  return assignRoles(table.columns).winners.get(role);
}

function splitAmount(row: StagedRow, creditColumn: string, debitColumn: string): string | undefined {
  const credit = parseNumeric(row[creditColumn] ?? '');
  const debit = parseNumeric(row[debitColumn] ?? '');
  if (credit.kind === 'missing' || debit.kind === 'missing') return undefined;
  return formatStagedAmount(credit.value - debit.value);
}

/**
 * Rename recognised columns to their canonical roles. A credit/debit pair
 * without a unified amount column is folded into `amount = credit - debit`;
 * a row whose pair does not parse gets no amount cell and is dropped later.
 */
export function normalizeColumns(table: StagedTable): ColumnNormalization {
  const { winners, contested } = assignRoles(table.columns);
  const warnings = contested.map(
    ({ column, role, winner }) => `Column "${column}" also matches ${role}; using "${winner}".`
  );

  const creditColumn = winners.get('_credit');
  const debitColumn = winners.get('_debit');
  const split =
    !winners.has('amount') && creditColumn !== undefined && debitColumn !== undefined
      ? { credit: creditColumn, debit: debitColumn }
      : null;
  const folded = (column: string): boolean => split !== null && (column === split.credit || column === split.debit);

  const renames = new Map<string, string>();
  for (const [role, column] of winners) {
    if (role === '_credit' || role === '_debit') continue;
    renames.set(column, role);
  }

  const columns: string[] = [];
  for (const column of table.columns) {
    if (folded(column)) continue;
    columns.push(renames.get(column) ?? column);
  }
  if (split !== null) columns.push('amount');

  const rows = table.rows.map((row) => {
    const next: Record<string, string> = {};
    for (const column of table.columns) {
      if (folded(column)) continue;
      const value = row[column];
      if (value !== undefined) next[renames.get(column) ?? column] = value;
    }
    if (split !== null) {
      const amount = splitAmount(row, split.credit, split.debit);
      if (amount !== undefined) next['amount'] = amount;
    }
    return next;
  });

  return { table: { columns, rows }, warnings, sourceColumns: [...table.columns] };
}

/**
 * @throws MissingColumnError when `date`, `description` or `amount` is absent
 */
export function validateColumns(table: Pick<StagedTable, 'columns'>, sourceColumns: readonly string[] = table.columns): void {
  const missing = REQUIRED_COLUMNS.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    throw new MissingColumnError(missing, sourceColumns);
  }
}
