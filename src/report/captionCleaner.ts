const ASTRAL_SYMBOLS = /[\u{10000}-\u{10FFFF}]/gu;
const HASHTAGS = /#[\p{L}\p{N}_]+/gu;
const DISALLOWED = /[^\p{L}\p{N}_\s.,!?;:()\-@/]/gu;
const PUNCTUATION_ONLY = /^[.,:;\-\u2013\u2014]*$/;

const keepLine = (line: string): boolean => {
  if (PUNCTUATION_ONLY.test(line)) {
    return false;
  }
  // Single stray symbol
  return !(line.length <= 1 && !/^[\p{L}\p{N}]$/u.test(line));
};

/**
 * Strip emoji, hashtags and decorative punctuation from a caption, keeping
 * mentions, URLs and line structure.
 */
export const cleanCaption = (caption: string): string => {
  if (!caption) {
    return '';
  }

  const text = caption
    .replace(ASTRAL_SYMBOLS, '')
    .replace(HASHTAGS, '')
    .normalize('NFKC')
    .replace(DISALLOWED, '')
    .replace(/ +/g, ' ');

  return text
    .split('\n')
    .map((line) => line.trim())
    .filter(keepLine)
    .join('\n')
    .trim();
};
