const MACRO_PATTERN = /%%|%\{(\?|!\?)?([A-Za-z_][A-Za-z0-9_]*)\}|%([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Expands `%{name}`, `%name` and `%{?name}` references from `macros`.
 *
 * Unknown macros are left as written so that build-time macros such as
 * `%{buildroot}` survive. `%{!?name}` expands to nothing when the macro is
 * defined and is kept otherwise.
 */
export function expandMacros(text: string, macros: Record<string, string>, depth = 0): string {
  if (depth > 16) return text;
  let changed = false;
  const expanded = text.replace(MACRO_PATTERN, (match, conditional: string | undefined, braced: string | undefined, bare: string | undefined) => {
    if (match === "%%") return match;
    const name = braced ?? bare ?? "";
    const defined = Object.prototype.hasOwnProperty.call(macros, name);
    if (conditional === "?") {
      changed = true;
      return defined ? macros[name] : "";
    }
    if (conditional === "!?") {
      if (!defined) return match;
      changed = true;
      return "";
    }
    if (!defined) return match;
    changed = true;
    return macros[name];
  });
  if (!changed) return expanded;
  return expandMacros(expanded, macros, depth + 1);
}

/** Replaces the `%%` escape with a literal percent sign. */
export function unescapePercent(text: string): string {
  return text.replace(/%%/g, "%");
}

export function parseMacroDefinition(line: string): { name: string; value: string } | null {
  const match = line.match(/^%(?:define|global)\s+([A-Za-z_][A-Za-z0-9_]*)(?:\(\))?\s+(.*)$/);
  if (!match) return null;
  return { name: match[1], value: match[2].trim() };
}
