// SGR foreground codes for node fills. Unknown names draw uncoloured.
const NAMED: Record<string, string> = {
  black: '30',
  darkred: '31',
  darkgreen: '32',
  darkyellow: '33',
  darkblue: '34',
  darkmagenta: '35',
  darkcyan: '36',
  grey: '37',
  gray: '37',
  darkgrey: '90',
  darkgray: '90',
  red: '91',
  green: '92',
  yellow: '93',
  blue: '94',
  magenta: '95',
  cyan: '96',
  white: '97',
};

function hexChannels(hex: string): number[] | undefined {
  if (!/^[0-9a-f]+$/i.test(hex)) return undefined;
  if (hex.length === 3) return Array.from(hex, (h) => parseInt(h + h, 16));
  if (hex.length === 6) return [0, 2, 4].map((i) => parseInt(hex.slice(i, i + 2), 16));
  return undefined;
}

/** SGR parameters for a fill such as `red`, `#f9f` or `#ff99ff`. */
export function ansiColor(fill: string): string | undefined {
  const value = fill.trim().toLowerCase();
  if (value.startsWith('#')) {
    const rgb = hexChannels(value.slice(1));
    return rgb ? `38;2;${rgb.join(';')}` : undefined;
  }
  return NAMED[value];
}

/** Wrap `text` in the escape for `code`. */
export function paint(code: string, text: string): string {
  return `\x1b[${code}m${text}\x1b[0m`;
}
