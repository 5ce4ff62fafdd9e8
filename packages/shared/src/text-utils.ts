export const normalizeWhitespace = (value: string): string => value.replace(/\s+/g, " ").trim();

const FULLWIDTH_DIGIT_OFFSET = "０".charCodeAt(0) - "0".charCodeAt(0);

/**
 * Folds full-width digits, signs and separators (`４．７`, `－`, `：`) into
 * their ASCII forms so numeric and timestamp patterns can stay ASCII-only.
 */
export const foldFullWidth = (value: string): string =>
  value
    .replace(/[０-９]/g, (digit) =>
      String.fromCharCode(digit.charCodeAt(0) - FULLWIDTH_DIGIT_OFFSET)
    )
    .replace(/[．]/g, ".")
    .replace(/[－−]/g, "-")
    .replace(/[：]/g, ":")
    .replace(/[／]/g, "/");
