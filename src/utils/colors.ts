/**
 * Terminal color utilities for CLI output
 */

// Check if colors should be disabled (piped output, CI, NO_COLOR env)
const supportsColor = (): boolean => {
  if (process.env.NO_COLOR) return false;
  if (process.env.FORCE_COLOR) return true;
  if (!process.stdout.isTTY) return false;
  return true;
};

export const colorEnabled = supportsColor();

const wrap =
  (code: string) =>
  (s: string): string =>
    colorEnabled ? `\x1b[${code}m${s}\x1b[0m` : s;

export const colors = {
  red: wrap('31'),
  green: wrap('32'),
  yellow: wrap('33'),
  cyan: wrap('36'),

  bold: wrap('1'),
  dim: wrap('2'),

  // Result kinds
  pass: wrap('32'),
  fail: wrap('33'),
  error: wrap('31'),
};

export default colors;
