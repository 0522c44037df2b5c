/**
 * .gitignore matching for single file names at the repository root
 * Supports plain names, leading "/", "**\/" prefixes, "*" and "?" globs and "!" negation
 */

interface Rule {
  negated: boolean;
  pattern: RegExp;
}

export function parseGitignore(content: string): Rule[] {
  const rules: Rule[] = [];
  for (const rawLine of content.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) {
      continue;
    }

    const negated = line.startsWith('!');
    if (negated) {
      line = line.slice(1);
    }
    // Directory-only patterns never match a file
    if (line.endsWith('/')) {
      continue;
    }
    line = line.replace(/^\*\*\//, '').replace(/^\//, '');
    // Patterns with an inner slash are anchored below the root; not a root file name
    if (line.includes('/')) {
      continue;
    }

    rules.push({ negated, pattern: globToRegExp(line) });
  }
  return rules;
}

/**
 * Whether a file at the repository root is ignored; the last matching rule wins
 */
export function isIgnored(content: string, fileName: string): boolean {
  let ignored = false;
  for (const rule of parseGitignore(content)) {
    if (rule.pattern.test(fileName)) {
      ignored = !rule.negated;
    }
  }
  return ignored;
}

function globToRegExp(glob: string): RegExp {
  let source = '';
  for (const char of glob) {
    if (char === '*') {
      source += '[^/]*';
    } else if (char === '?') {
      source += '[^/]';
    } else {
      source += char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}
