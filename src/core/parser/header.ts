export const SECTION_OPEN = "[";
export const SECTION_CLOSE = "]";

export interface SectionHeader {
  name: string;
  depth: number;
}

/** Returns null when the header's brackets are unbalanced or the name is empty. */
export function parseSectionHeader(line: string): SectionHeader | null {
  let depth = 0;
  while (depth < line.length && line.charAt(depth) === SECTION_OPEN) {
    depth += 1;
  }

  let closing = 0;
  while (closing < line.length - depth && line.charAt(line.length - 1 - closing) === SECTION_CLOSE) {
    closing += 1;
  }

  if (depth === 0 || closing !== depth) {
    return null;
  }

  const name = line.slice(depth, line.length - closing);
  if (!name) {
    return null;
  }
  return { name, depth };
}
