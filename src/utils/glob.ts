/**
 * Shell-style wildcard matching over a whole string.
 *
 *   *      any run of characters (including none)
 *   ?      exactly one character
 *   [abc]  one character from the class, [!abc] negated
 */

const cache = new Map<string, RegExp>();

export function globToRegExp(glob: string): RegExp {
  const hit = cache.get(glob);
  if (hit) return hit;

  let out = "^";
  for (let i = 0; i < glob.length; i++) {
    const ch = glob[i];
    if (ch === "*") {
      out += ".*";
    } else if (ch === "?") {
      out += ".";
    } else if (ch === "[") {
      const close = glob.indexOf("]", i + 2);
      if (close < 0) {
        out += "\\[";
        continue;
      }
      let body = glob.slice(i + 1, close).replace(/\\/g, "\\\\");
      if (body.startsWith("!")) body = `^${body.slice(1)}`;
      out += `[${body}]`;
      i = close;
    } else {
      out += ch.replace(/[.+^${}()|\\\]]/g, "\\$&");
    }
  }
  const re = new RegExp(`${out}$`, "s");
  cache.set(glob, re);
  return re;
}

export function globMatch(value: string, glob: string): boolean {
  return globToRegExp(glob).test(value);
}

export function hasGlobChars(value: string): boolean {
  return /[*?[]/.test(value);
}
