import { LedgerSection } from './enums';

/**
 * Malformed balance-sheet or scenario input. `issues` holds one line per problem found,
 * so a form can show all of them at once.
 */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.length === 1 ? issues[0] : `${issues.length} validation issues: ${issues.join('; ')}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** A mutation referenced a line item that the ledger does not carry. */
export class UnknownCategoryError extends Error {
  readonly section: LedgerSection;
  readonly category: string;

  constructor(section: LedgerSection, category: string) {
    super(`Unknown ${section} category: ${category}`);
    this.name = 'UnknownCategoryError';
    this.section = section;
    this.category = category;
  }
}
