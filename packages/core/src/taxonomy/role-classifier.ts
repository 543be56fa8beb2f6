import { InvariantViolationError } from '../errors.js';
import type { ClassifiedStatementType, RoleKeywordTable, StatementType } from './types.js';

/**
 * US-GAAP phrasing. Other markets (IFRS, FCA, ESMA) supply their own table
 * through configuration.
 */
export const DEFAULT_ROLE_KEYWORDS: RoleKeywordTable = {
  balance_sheet: ['balance sheet', 'financial position'],
  cash_flow: ['cash flow'],
  income_statement: ['income', 'operations', 'comprehensive'],
};

/** Keyword match order. A definition matching several types takes the first. */
const CLASSIFICATION_ORDER: readonly ClassifiedStatementType[] = [
  'balance_sheet',
  'cash_flow',
  'income_statement',
];

/**
 * Classify a presentation role by its human-readable definition.
 * Matching is a lower-cased substring search in priority order; anything
 * unmatched is `other`.
 */
export function classifyRole(definition: string, keywords: RoleKeywordTable = DEFAULT_ROLE_KEYWORDS): StatementType {
  const text = definition.toLowerCase();
  for (const statementType of CLASSIFICATION_ORDER) {
    if (keywords[statementType].some(keyword => text.includes(keyword))) {
      return statementType;
    }
  }
  return 'other';
}

/**
 * Reject keyword tables that let one keyword stand for two statement types,
 * since a role could then imply two statements. Keywords are lower-cased.
 */
export function validateKeywordTable(keywords: RoleKeywordTable, filingId = 'unknown'): RoleKeywordTable {
  const owner = new Map<string, ClassifiedStatementType>();
  const normalized: Record<ClassifiedStatementType, string[]> = {
    balance_sheet: [],
    cash_flow: [],
    income_statement: [],
  };

  for (const statementType of CLASSIFICATION_ORDER) {
    for (const raw of keywords[statementType]) {
      const keyword = raw.trim().toLowerCase();
      if (!keyword) continue;
      const existing = owner.get(keyword);
      if (existing && existing !== statementType) {
        throw new InvariantViolationError(
          `Role keyword "${keyword}" is assigned to both ${existing} and ${statementType}`,
          filingId,
          keyword,
        );
      }
      if (existing) continue;
      owner.set(keyword, statementType);
      normalized[statementType].push(keyword);
    }
  }

  return normalized;
}

/** Stable identity of a keyword table after validation, for cache keys. */
export function keywordTableKey(keywords: RoleKeywordTable = DEFAULT_ROLE_KEYWORDS, filingId = 'unknown'): string {
  const normalized = validateKeywordTable(keywords, filingId);
  return CLASSIFICATION_ORDER.map(type => `${type}=${normalized[type].join('|')}`).join(';');
}
