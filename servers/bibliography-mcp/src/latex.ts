// \cite, \citep, \citet, \citealt, \Citep, \citeauthor*, \nocite ... with any
// number of optional [..] arguments: \citep[e.g.][p.~4]{key1, key2}
const CITE_PATTERN = /\\(?:[Cc]ite[a-zA-Z]*|nocite)\*?\s*(?:\[[^\]]*\]\s*)*\{([^}]*)\}/g;

function createCiteRegex(): RegExp {
  return new RegExp(CITE_PATTERN.source, CITE_PATTERN.flags);
}

/** Drops `%` comments, keeping escaped `\%`. */
export function stripComments(texContent: string): string {
  return texContent.replace(/(^|[^\\])%.*$/gm, '$1');
}

export interface ExtractedKeys {
  keys: string[];
  warnings: string[];
}

/**
 * Citation keys in order of first appearance. `\nocite{*}` is ignored;
 * empty keys (`\cite{a,,b}`) are reported as warnings.
 */
export function extractCiteKeys(texContent: string, source = 'input'): ExtractedKeys {
  const seen = new Set<string>();
  const keys: string[] = [];
  const warnings: string[] = [];
  const regex = createCiteRegex();
  const content = stripComments(texContent);

  let match;
  while ((match = regex.exec(content)) !== null) {
    for (const part of (match[1] ?? '').split(',')) {
      const key = part.trim();
      if (!key) {
        warnings.push(`${source}: Empty citation key found`);
      } else if (key !== '*' && !seen.has(key)) {
        seen.add(key);
        keys.push(key);
      }
    }
  }

  return { keys, warnings };
}
