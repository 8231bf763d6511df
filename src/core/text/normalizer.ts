const TRIM_CHARS = new Set([" ", "\t", "\r", "\n"]);
const COMMENT_CHARS = new Set(["#", ";"]);

export function trim(line: string): string {
  let start = 0;
  let end = line.length;

  while (start < end && TRIM_CHARS.has(line.charAt(start))) {
    start += 1;
  }
  while (end > start && TRIM_CHARS.has(line.charAt(end - 1))) {
    end -= 1;
  }

  return line.slice(start, end);
}

export function stripComment(text: string): string {
  for (let i = 0; i < text.length; i += 1) {
    if (COMMENT_CHARS.has(text.charAt(i))) {
      return text.slice(0, i);
    }
  }
  return text;
}

export function isCommentLine(line: string): boolean {
  return line.length > 0 && COMMENT_CHARS.has(line.charAt(0));
}
