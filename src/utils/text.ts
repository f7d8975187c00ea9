export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  return `${text.slice(0, maxLength - 1)}…`;
}

/** Makes a server-supplied message safe to print: no control characters, one line, bounded length. */
export function sanitizeMessage(text: string, maxLength: number = 200): string {
  const printable = text.replace(/[\u0000-\u001f\u007f]/g, ' ');
  return truncate(collapseWhitespace(printable), maxLength);
}
