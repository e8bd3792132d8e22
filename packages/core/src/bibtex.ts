const ENTRY_HEAD = /(@\w+\s*\{)\s*([^,\s]+)\s*,/;
const NON_ENTRY_TYPES = new Set(['comment', 'string', 'preamble']);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function extractBibtexKey(bibtex: string): string | undefined {
  return ENTRY_HEAD.exec(bibtex)?.[2];
}

/** Rewrites only the first entry's key. */
export function replaceBibtexKey(bibtex: string, newKey: string): string {
  return bibtex.replace(ENTRY_HEAD, (_match, head: string) => `${head}${newKey},`);
}

/**
 * Reads `field = {value}` or `field = "value"` at the start of a line.
 * Fields that are missing are left out of the result.
 */
export function extractBibtexFields<F extends string>(
  bibtex: string,
  ...fieldNames: F[]
): Partial<Record<F, string>> {
  const result: Partial<Record<F, string>> = {};
  for (const field of fieldNames) {
    const pattern = new RegExp(`^\\s*${escapeRegExp(field)}\\s*=\\s*(?:"([^"]+)"|\\{([^}]+)\\})`, 'mi');
    const match = pattern.exec(bibtex);
    const value = match?.[1] ?? match?.[2];
    if (value !== undefined) {
      result[field] = value.trim();
    }
  }
  return result;
}

export function makeCrossrefStub(stubKey: string, targetKey: string): string {
  return `@misc{${stubKey},\n  crossref = {${targetKey}}\n}`;
}

/**
 * Splits a .bib file into key -> entry text, matching braces to find where
 * each entry ends. @comment, @string and @preamble blocks are skipped.
 * A later entry with a key already seen does not replace the first one.
 */
export function parseBibEntries(content: string): Map<string, string> {
  const entries = new Map<string, string>();
  const entryRegex = /@(\w+)\s*\{\s*([^,\s]+)\s*,/g;

  let match;
  while ((match = entryRegex.exec(content)) !== null) {
    const type = match[1] ?? '';
    const key = match[2] ?? '';

    let braceCount = 1;
    let endPos = content.indexOf('{', match.index) + 1;
    while (braceCount > 0 && endPos < content.length) {
      if (content[endPos] === '{') braceCount++;
      if (content[endPos] === '}') braceCount--;
      endPos++;
    }

    if (!NON_ENTRY_TYPES.has(type.toLowerCase()) && !entries.has(key)) {
      entries.set(key, content.slice(match.index, endPos).trim());
    }
    entryRegex.lastIndex = endPos;
  }

  return entries;
}

/** Keeps the first `maxAuthors` names and appends "others". 0 or undefined disables. */
export function truncateAuthors(bibtex: string, maxAuthors?: number): string {
  if (!maxAuthors) {
    return bibtex;
  }

  const match = /(\s*author\s*=\s*\{)([\s\S]+?)(\},?\s*\n)/i.exec(bibtex);
  if (!match) {
    return bibtex;
  }

  const [whole, prefix, authorsStr, suffix] = match;
  const authors = (authorsStr ?? '').split(/\s+and\s+/).map(a => a.trim());

  if (authors.length <= maxAuthors) {
    return bibtex;
  }

  const truncated = [...authors.slice(0, maxAuthors), 'others'].join(' and ');
  return bibtex.slice(0, match.index) + `${prefix}${truncated}${suffix}` + bibtex.slice(match.index + whole.length);
}

/**
 * Reads journal macros from an AAS style file: `\def\apj{\ref@jnl{ApJ}}`
 * plus aliases declared with `\def\alias{\apj}`, `\let\alias\apj` or `\let\alias=\apj`.
 */
export function parseAasMacros(styContent: string): Map<string, string> {
  const macros = new Map<string, string>();

  for (const match of styContent.matchAll(/\\def\\(\w+)\{\\ref@jnl\{([^}]+)\}\}/g)) {
    const [, name, value] = match;
    if (name && value) macros.set(name, value);
  }

  for (const match of styContent.matchAll(/\\(?:def|let)\\(\w+)\s*=?\s*\{?\\(\w+)\}?/g)) {
    const [, alias, original] = match;
    if (!alias || !original) continue;
    const target = macros.get(original);
    if (!macros.has(alias) && target !== undefined) {
      macros.set(alias, target);
    }
  }

  return macros;
}

function macroPattern(name: string, flags = ''): RegExp {
  return new RegExp(`\\\\${escapeRegExp(name)}(?!\\w)`, flags);
}

export function findUsedMacros(bibtex: string, macros: Map<string, string>): Map<string, string> {
  const used = new Map<string, string>();
  for (const [name, value] of macros) {
    if (macroPattern(name).test(bibtex)) {
      used.set(name, value);
    }
  }
  return used;
}

/** `{\apj}` becomes `{ApJ}`. */
export function expandAasMacros(bibtex: string, macros: Map<string, string>): string {
  let expanded = bibtex;
  for (const [name, value] of macros) {
    expanded = expanded.replace(macroPattern(name, 'g'), () => value);
  }
  return expanded;
}
