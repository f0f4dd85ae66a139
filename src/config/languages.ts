/** Display names for every language code the assistant knows about. */
export const LANGUAGE_NAMES: Record<string, string> = {
  en: 'English',
  hi: 'Hindi',
  raj: 'Rajasthani',
  gu: 'Gujarati',
  mr: 'Marathi',
  pa: 'Punjabi',
  ta: 'Tamil',
  bn: 'Bengali',
  te: 'Telugu',
  kn: 'Kannada',
  ml: 'Malayalam',
  or: 'Odia',
};

/**
 * Codes understood by machine-translation backends.
 * Rajasthani has no MT model of its own and falls back to Hindi.
 */
export const TRANSLATION_CODES: Record<string, string> = {
  en: 'en',
  hi: 'hi',
  raj: 'hi',
  gu: 'gu',
  mr: 'mr',
  pa: 'pa',
  ta: 'ta',
  bn: 'bn',
  te: 'te',
  kn: 'kn',
  ml: 'ml',
  or: 'or',
};

export function languageName(code: string): string {
  return LANGUAGE_NAMES[code] ?? code;
}
