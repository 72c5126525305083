// ANSI helpers for diagnostics on stderr. Disabled when stderr is not a
// terminal or NO_COLOR is set, so piped output stays plain.
const enabled = Boolean(process.stderr.isTTY) && !process.env.NO_COLOR;

const paint = (code: string) => (s: string) => (enabled ? `\x1b[${code}m${s}\x1b[0m` : s);

export const c = {
  dim: paint("2"),
  gray: paint("90"),
  green: paint("32"),
  yellow: paint("33"),
  red: paint("31"),
  cyan: paint("36"),
  bold: paint("1"),
};

export const sym = {
  ok: c.green("✔"),
  warn: c.yellow("⚠"),
  fail: c.red("✖"),
  info: c.cyan("ℹ"),
  dot: c.gray("•"),
};

export const log = {
  ok: (msg: string) => console.error(`${sym.ok} ${msg}`),
  warn: (msg: string) => console.error(`${sym.warn} ${msg}`),
  fail: (msg: string) => console.error(`${sym.fail} ${msg}`),
};
