/** Locale-independent string order (UTF-16 code units). */
export const byCodeUnit = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);
