const LINE_SEPARATOR = /\r\n|\n|\r/;

/**
 * Produces the value of a block string from its raw content: the common
 * indentation of every line but the first is removed, as are leading and
 * trailing blank lines.
 */
export function dedentBlockString(raw: string): string {
  const lines = raw.split(LINE_SEPARATOR);

  let commonIndent: number | undefined;
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    const indent = leadingWhitespace(line);
    if (
      indent < line.length &&
      (commonIndent === undefined || indent < commonIndent)
    ) {
      commonIndent = indent;
    }
  }

  if (commonIndent) {
    const indent = commonIndent;
    for (let i = 1; i < lines.length; i++) {
      lines[i] = lines[i].slice(indent);
    }
  }

  let first = 0;
  while (first < lines.length && isBlank(lines[first])) {
    first++;
  }

  let last = lines.length;
  while (last > first && isBlank(lines[last - 1])) {
    last--;
  }

  return lines.slice(first, last).join('\n');
}

function leadingWhitespace(line: string): number {
  let i = 0;
  while (i < line.length && (line[i] === ' ' || line[i] === '\t')) {
    i++;
  }
  return i;
}

function isBlank(line: string): boolean {
  return leadingWhitespace(line) === line.length;
}
