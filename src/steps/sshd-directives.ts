// sshd_config editing. Keywords are case-insensitive; values are compared
// exactly. Only the global section (everything before the first active
// `Match` line) is read or edited, since directives after it are conditional.

export interface DirectiveLine {
  keyword: string;
  value: string;
  commented: boolean;
}

const DIRECTIVE_LINE = /^\s*(#)?([A-Za-z][A-Za-z0-9]*)(?:\s*=\s*|\s+|$)(.*)$/;

/**
 * Parse `Keyword value`, `Keyword=value` or a commented-out `#Keyword value`.
 * Prose comments (`# text`) are not directives.
 */
export function parseDirectiveLine(line: string): DirectiveLine | null {
  const match = DIRECTIVE_LINE.exec(line);
  if (!match) return null;
  const [, hash, keyword, rest] = match;
  if (keyword === undefined) return null;
  return { keyword, value: (rest ?? '').trim(), commented: hash !== undefined };
}

function sameKeyword(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function splitConfig(content: string): string[] {
  if (content === '') return [];
  const lines = content.split('\n');
  if (content.endsWith('\n')) lines.pop();
  return lines;
}

function joinConfig(lines: string[]): string {
  return lines.length === 0 ? '' : `${lines.join('\n')}\n`;
}

function globalSectionEnd(lines: string[]): number {
  const index = lines.findIndex((line) => {
    const directive = parseDirectiveLine(line);
    return directive !== null && !directive.commented && sameKeyword(directive.keyword, 'Match');
  });
  return index === -1 ? lines.length : index;
}

/** Effective value of a global directive, or null when it is not set */
export function readDirective(content: string, keyword: string): string | null {
  const lines = splitConfig(content);
  for (const line of lines.slice(0, globalSectionEnd(lines))) {
    const directive = parseDirectiveLine(line);
    if (directive && !directive.commented && sameKeyword(directive.keyword, keyword)) {
      return directive.value;
    }
  }
  return null;
}

export function directivesSatisfied(content: string, directives: Record<string, string>): boolean {
  return Object.entries(directives).every(
    ([keyword, value]) => readDirective(content, keyword) === value,
  );
}

function setDirective(lines: string[], keyword: string, value: string): void {
  const end = globalSectionEnd(lines);
  const active: number[] = [];
  const commented: number[] = [];

  for (const [i, line] of lines.slice(0, end).entries()) {
    const directive = parseDirectiveLine(line);
    if (!directive || !sameKeyword(directive.keyword, keyword)) continue;
    (directive.commented ? commented : active).push(i);
  }

  const desired = `${keyword} ${value}`;
  const target = active[0] ?? commented[0];
  if (target === undefined) {
    lines.splice(end, 0, desired);
    return;
  }

  lines[target] = desired;
  // Drop every other occurrence, active or commented-out, back to front
  const others = [...active, ...commented]
    .filter((i) => i !== target)
    .sort((a, b) => b - a);
  for (const i of others) {
    lines.splice(i, 1);
  }
}

/**
 * Set each directive in the global section: rewrite the first active line,
 * else the first commented-out line, else insert a new line before the
 * first `Match` block (or at the end). Other occurrences of the keyword in
 * the global section are removed. Applying twice changes nothing.
 */
export function applyDirectives(content: string, directives: Record<string, string>): string {
  const lines = splitConfig(content);
  for (const [keyword, value] of Object.entries(directives)) {
    setDirective(lines, keyword, value);
  }
  return joinConfig(lines);
}
