import { DependentInference } from "../types/rateTables";

// A negated clause starts at "no", "without" or "alone" and runs until the next
// bracket, comma or semicolon, the word "with" or "and", or the end of the label.
// "or" keeps the clause going: "no parents or children" negates both.
const NEGATED_CLAUSE = /\b(?:no|without|alone)\b.*?(?=[(),;]|\b(?:with|and)\b|$)/g;

const CHILD_MENTION = /\bchild(?:ren)?\b/;
const SPOUSE_MENTION = /\bspouses?\b/;
const PLURAL_PARENT_MENTION = /\bparents\b/;
const SINGLE_PARENT_MENTION = /\bparent\b/;

export function stripNegatedClauses(status: string): string {
  return status.toLowerCase().replace(NEGATED_CLAUSE, " ");
}

/**
 * Reads spouse, parent and child presence out of a dependent status label,
 * e.g. "With spouse and 1 parent (no children)".
 */
export function inferDependents(status: string): DependentInference {
  const affirmed = stripNegatedClauses(status);

  let parentCount = 0;
  if (PLURAL_PARENT_MENTION.test(affirmed)) {
    parentCount = 2;
  } else if (SINGLE_PARENT_MENTION.test(affirmed)) {
    parentCount = 1;
  }

  return {
    hasSpouse: SPOUSE_MENTION.test(affirmed),
    parentCount,
    hasChild: CHILD_MENTION.test(affirmed)
  };
}
