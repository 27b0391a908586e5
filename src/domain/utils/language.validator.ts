import iso6391Codes from "./iso-639-1.codes.json";

const ISO_639_1_CODES = new Set<string>(iso6391Codes);

/**
 * Checks a language hint against the ISO-639-1 two-letter codes.
 */
export function isValidISO6391Code(lang: string): boolean {
  if (!/^[a-z]{2}$/.test(lang)) {
    return false;
  }

  return ISO_639_1_CODES.has(lang);
}

/**
 * Lowercases and trims a language hint.
 * @returns the normalized code, or undefined when absent or not ISO-639-1
 */
export function validateAndNormalizeLanguage(lang: string | undefined | null): string | undefined {
  if (!lang) {
    return undefined;
  }

  const normalized = lang.toLowerCase().trim();

  if (isValidISO6391Code(normalized)) {
    return normalized;
  }

  return undefined;
}
