/**
 * Concept identity and attributes.
 *
 * A concept id is `namespace:localName` with any filing-year suffix removed
 * from the namespace, so `us-gaap-2024:Assets` and `us-gaap:Assets` are the
 * same concept.
 */

/** Canonical `namespace:localName` string. */
export type ConceptId = string;

export type PeriodType = 'instant' | 'duration' | 'unknown';
export type BalanceType = 'debit' | 'credit' | 'none';

export interface ConceptName {
  namespace: string;
  localName: string;
}

export interface Concept extends ConceptName {
  readonly id: ConceptId;
  readonly periodType: PeriodType;
  readonly balanceType: BalanceType;
  readonly isAbstract: boolean;
}
