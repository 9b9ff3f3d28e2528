// Control, format, surrogate and private-use characters, except \n and \t.
const NON_PRINTABLE = /[^\P{C}\n\t]/gu;
const LINE_SEPARATORS = /\r\n?|[\u2028\u2029]/g;
const ODD_SPACES = /[^\P{Zs} ]/gu;

/**
 * Normalise extracted text before chunking: unify line endings, turn NUL and
 * unusual spaces into plain spaces, drop everything unprintable except
 * newlines and tabs, trim.
 */
export function sanitizeText(text: string): string {
  return text
    .replace(LINE_SEPARATORS, "\n")
    .replace(/\0/g, " ")
    .replace(ODD_SPACES, " ")
    .replace(NON_PRINTABLE, "")
    .trim();
}
