// language/names.ts

import names from "./data/fortran_names.json";

/** Statement keywords; never treated as symbols. */
export const FORTRAN_KEYWORDS: ReadonlySet<string> = new Set(names.keywords);

/** Intrinsic functions; calls to them are left for the intrinsic substitutions. */
export const FORTRAN_INTRINSICS: ReadonlySet<string> = new Set(names.intrinsics);

export function isReservedName(word: string): boolean {
  return FORTRAN_KEYWORDS.has(word) || FORTRAN_INTRINSICS.has(word);
}
