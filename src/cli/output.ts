/**
 * CLI output formatting utilities.
 * Respects NO_COLOR and FORCE_COLOR per https://no-color.org/
 */

function useColor(): boolean {
  if (process.env.FORCE_COLOR) return true;
  if (process.env.NO_COLOR || process.env.TERM === 'dumb') return false;
  return process.stdout.isTTY ?? false;
}

const ESC = '\x1b[';

const codes = {
  reset: `${ESC}0m`,
  green: `${ESC}32m`,
  yellow: `${ESC}33m`,
  magenta: `${ESC}35m`,
  cyan: `${ESC}36m`,
  boldRed: `${ESC}1;31m`,
  boldWhite: `${ESC}1;37m`,
  boldGreen: `${ESC}1;32m`,
};

function wrap(code: string, text: string): string {
  return useColor() ? `${code}${text}${codes.reset}` : text;
}

export const color = {
  red: (t: string) => wrap(codes.boldRed, t),
  yellow: (t: string) => wrap(codes.yellow, t),
  green: (t: string) => wrap(codes.green, t),
  magenta: (t: string) => wrap(codes.magenta, t),
  cyan: (t: string) => wrap(codes.cyan, t),
  bold: (t: string) => wrap(codes.boldWhite, t),
  boldGreen: (t: string) => wrap(codes.boldGreen, t),
};
