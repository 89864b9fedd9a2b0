/**
 * Rule tables shipped as data files under `rules/`. They are read and
 * validated once, when this module is first imported, and frozen.
 */
import { readFileSync } from 'fs';
import { z } from 'zod';

export const ColumnRoleSchema = z.enum(['date', 'description', 'amount', 'type', '_credit', '_debit']);
export type ColumnRole = z.infer<typeof ColumnRoleSchema>;

const ColumnSynonymFileSchema = z.object({
  roles: z
    .array(
      z.object({
        role: ColumnRoleSchema,
        labels: z.array(z.string().min(1)).min(1),
      })
    )
    .min(1),
});

const CreditKeywordFileSchema = z.object({
  keywords: z.array(z.string().min(1)).min(1),
});

export interface SynonymRule {
  readonly label: string;
  readonly role: ColumnRole;
  /** Position within the role's label list; lower ranks win a contested role. */
  readonly rank: number;
}

export interface KeywordRule {
  readonly keyword: string;
  readonly pattern: RegExp;
}

function readRuleFile(fileName: string): unknown {
  const raw = readFileSync(new URL(`../rules/${fileName}`, import.meta.url), 'utf-8');
  return JSON.parse(raw);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function loadSynonymRules(): ReadonlyMap<string, SynonymRule> {
  const file = ColumnSynonymFileSchema.parse(readRuleFile('column-synonyms.json'));
  const rules = new Map<string, SynonymRule>();

  for (const entry of file.roles) {
    entry.labels.forEach((label, rank) => {
      const key = normalizeLabel(label);
      if (rules.has(key)) {
        throw new Error(`Duplicate column synonym "${label}" in column-synonyms.json`);
      }
      rules.set(key, Object.freeze({ label: key, role: entry.role, rank }));
    });
  }

  return rules;
}

function loadKeywordRules(): readonly KeywordRule[] {
  const file = CreditKeywordFileSchema.parse(readRuleFile('credit-keywords.json'));
  return Object.freeze(
    file.keywords.map((keyword) =>
      Object.freeze({
        keyword,
        pattern: new RegExp(`\\b${escapeRegExp(keyword.toLowerCase())}\\b`),
      })
    )
  );
}

/** Trim, lower-case and collapse inner whitespace of a header label. */
export function normalizeLabel(label: string): string {
  return label.trim().toLowerCase().replace(/\s+/g, ' ');
}

export const COLUMN_SYNONYMS: ReadonlyMap<string, SynonymRule> = loadSynonymRules();

export const CREDIT_KEYWORDS: readonly KeywordRule[] = loadKeywordRules();
