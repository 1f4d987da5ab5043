const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

export function bashSingleQuote(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Quotes a word for a POSIX shell only when it needs it, so plain commands
 * render the way a person would type them. A leading `~/` is left unquoted
 * so the shell still expands it.
 */
export function shellWord(value: string): string {
  if (value.length === 0) return "''";
  if (value.startsWith("~/")) {
    const rest = value.slice(2);
    return rest.length === 0 ? "~/" : `~/${shellWord(rest)}`;
  }
  if (value === "~") return value;
  // zsh expands a leading `=` to a command path.
  return SAFE_WORD.test(value) && !value.startsWith("=") ? value : bashSingleQuote(value);
}

/**
 * Splits one shell line into words. Handles single quotes, double quotes and
 * backslash escapes; stops at an unquoted `#`. Expansions are not performed.
 */
export function splitShellWords(line: string): string[] {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < line.length; i++) {
    const c = line.charAt(i);

    if (quote === "'") {
      if (c === "'") quote = null;
      else current += c;
      continue;
    }

    if (quote === '"') {
      if (c === '"') {
        quote = null;
      } else if (c === "\\" && i + 1 < line.length && /["\\$`]/.test(line.charAt(i + 1))) {
        current += line.charAt(i + 1);
        i++;
      } else {
        current += c;
      }
      continue;
    }

    if (c === "'" || c === '"') {
      quote = c;
      inWord = true;
      continue;
    }
    if (c === "\\" && i + 1 < line.length) {
      current += line.charAt(i + 1);
      inWord = true;
      i++;
      continue;
    }
    if (/\s/.test(c)) {
      if (inWord) words.push(current);
      current = "";
      inWord = false;
      continue;
    }
    if (c === "#" && !inWord) break;

    current += c;
    inWord = true;
  }

  if (quote) throw new Error(`unterminated ${quote} quote in: ${line}`);
  if (inWord) words.push(current);
  return words;
}
