import { FindError } from "./types.js";

/**
 * Whether `needle` matches anywhere in `haystack`, ignoring case.
 *
 * The needle is compiled as a regular expression, not escaped: `"пі.23"`
 * matches `"пзпі-23-2"`, and `"("` throws `InvalidRegexString`.
 */
export function matches(needle: string, haystack: string): boolean {
  let re: RegExp;
  try {
    re = new RegExp(needle.toLowerCase());
  } catch (err) {
    throw new FindError("InvalidRegexString", needle, { cause: err });
  }
  return re.test(haystack.toLowerCase());
}

export function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
