import type { ValidationError } from './types.js';

export interface DiagramBlock {
  content: string;
  startLine: number; // 1-based line number of the first content line (line after opening fence)
  endLine: number;   // 1-based line number of the closing fence line
  info: string;      // raw info string after the opening fence
  fence: string;     // the fence marker used (``` or ~~~, length >= 3)
}

const FENCE_RE = /^(\s{0,3})(`{3,}|~{3,})\s*([^\n`]*)?\s*$/;

function isDiagramInfo(info: string | undefined): boolean {
  if (!info) return false;
  const lang = (info.split(/\s+/)[0] || '').toLowerCase();
  return lang === 'mermaid' || lang === 'mmd';
}

export function isMarkdownFile(path: string): boolean {
  return /\.(md|markdown)$/i.test(path);
}

export function extractDiagramBlocks(text: string): DiagramBlock[] {
  const lines = text.split(/\r?\n/);
  const blocks: DiagramBlock[] = [];
  let i = 0;
  while (i < lines.length) {
    const m = FENCE_RE.exec(lines[i]);
    const info = (m?.[3] || '').trim();
    if (!m || !isDiagramInfo(info)) {
      i++;
      continue;
    }
    // Capture until a closing fence of the same marker, at least as long as the opening one
    const fence = m[2];
    const closeRe = new RegExp(`^\\s{0,3}${fence[0]}{${fence.length},}\\s*$`);
    const contentLines: string[] = [];
    const startLine = i + 2;
    i++;
    let closed = false;
    for (; i < lines.length; i++) {
      if (closeRe.test(lines[i])) {
        closed = true;
        break;
      }
      contentLines.push(lines[i]);
    }
    const endLine = closed ? i + 1 : lines.length + 1;
    blocks.push({ content: contentLines.join('\n'), startLine, endLine, info, fence });
    if (closed) i++;
  }
  return blocks;
}

export function offsetErrors(errors: ValidationError[], lineOffset: number): ValidationError[] {
  if (!lineOffset) return errors;
  return errors.map(e => ({ ...e, line: e.line + lineOffset }));
}
