import * as fs from 'fs/promises';

/**
 * One item per line. Blank lines and `#` comments are skipped; repeated
 * entries are kept once, in first-seen order.
 */
export function parseWordList(text: string): string[] {
  const seen = new Set<string>();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) {
      continue;
    }
    seen.add(line);
  }
  return [...seen];
}

export async function loadWordList(filePath: string): Promise<string[]> {
  const text = await fs.readFile(filePath, 'utf8');
  return parseWordList(text);
}
