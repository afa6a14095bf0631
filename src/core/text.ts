// Display-width helpers. Layout measures in terminal cells, not UTF-16 units.

/** True when the code point occupies two terminal cells (CJK, fullwidth forms). */
export function isFullwidthCodePoint(codePoint: number): boolean {
  if (codePoint < 0x1100) return false;
  return (
    codePoint <= 0x115f ||
    codePoint === 0x2329 ||
    codePoint === 0x232a ||
    (codePoint >= 0x2e80 && codePoint <= 0x3247 && codePoint !== 0x303f) ||
    (codePoint >= 0x3250 && codePoint <= 0x4dbf) ||
    (codePoint >= 0x4e00 && codePoint <= 0xa4c6) ||
    (codePoint >= 0xa960 && codePoint <= 0xa97c) ||
    (codePoint >= 0xac00 && codePoint <= 0xd7a3) ||
    (codePoint >= 0xf900 && codePoint <= 0xfaff) ||
    (codePoint >= 0xfe10 && codePoint <= 0xfe19) ||
    (codePoint >= 0xfe30 && codePoint <= 0xfe6b) ||
    (codePoint >= 0xff01 && codePoint <= 0xff60) ||
    (codePoint >= 0xffe0 && codePoint <= 0xffe6) ||
    (codePoint >= 0x1b000 && codePoint <= 0x1b001) ||
    (codePoint >= 0x1f200 && codePoint <= 0x1f251) ||
    (codePoint >= 0x1f300 && codePoint <= 0x1f64f) ||
    (codePoint >= 0x1f900 && codePoint <= 0x1f9ff) ||
    (codePoint >= 0x20000 && codePoint <= 0x3fffd)
  );
}

function isZeroWidthCodePoint(codePoint: number): boolean {
  return (
    codePoint <= 0x1f ||
    (codePoint >= 0x7f && codePoint <= 0x9f) ||
    (codePoint >= 0x300 && codePoint <= 0x36f) ||
    codePoint === 0x200b ||
    codePoint === 0x200d ||
    (codePoint >= 0xfe00 && codePoint <= 0xfe0f)
  );
}

export function charWidth(char: string): number {
  const codePoint = char.codePointAt(0) ?? 0;
  if (isZeroWidthCodePoint(codePoint)) return 0;
  return isFullwidthCodePoint(codePoint) ? 2 : 1;
}

export function displayWidth(input: string): number {
  let width = 0;
  for (const char of Array.from(input)) width += charWidth(char);
  return width;
}

/** Labels carry explicit breaks only; `\r\n` and `\r` are folded into `\n`. */
export function labelLines(label: string): string[] {
  return label.replace(/\r\n?/g, '\n').split('\n');
}

export function labelWidth(label: string): number {
  return Math.max(0, ...labelLines(label).map(displayWidth));
}
