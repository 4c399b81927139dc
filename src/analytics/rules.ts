/**
 * Ordered rule tables: rules are tried top to bottom and the first
 * matching rule decides the result.
 */

export interface Rule<I, R> {
  when: (input: I) => boolean;
  result: R;
}

export function firstMatch<I, R>(rules: readonly Rule<I, R>[], input: I, fallback: R): R {
  for (const rule of rules) {
    if (rule.when(input)) return rule.result;
  }
  return fallback;
}
