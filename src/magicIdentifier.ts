const PREFIX = "__TURBOPACK__";
const SUFFIX = "__";

const isPlain = (c: string) => /^[0-9A-Za-z]$/.test(c);

/**
 * Encodes a descriptive label into a valid JavaScript identifier.
 *
 * Letters and digits are kept, a space becomes `__`, and everything else is
 * written as a `$`-delimited hex run. The same label always gives the same
 * identifier and distinct labels give distinct identifiers.
 */
export function mangle(content: string): string {
  let r = PREFIX;
  let hexMode = false;

  for (const c of content) {
    if (isPlain(c) || c === " ") {
      if (hexMode) {
        r += "$";
        hexMode = false;
      }
      r += c === " " ? "__" : c;
    } else if (c === "_" && (!r.endsWith("_") || hexMode)) {
      if (hexMode) {
        r += "$";
        hexMode = false;
      }
      r += "_";
    } else if (c === "$" && !hexMode) {
      r += "$$";
    } else {
      const code = c.codePointAt(0) ?? 0;
      if (code <= 0xff) {
        if (!hexMode) {
          r += "$";
          hexMode = true;
        }
        r += code.toString(16).padStart(2, "0");
      } else {
        if (!hexMode) r += "$";
        r += `_${code.toString(16)}$`;
        hexMode = false;
      }
    }
  }

  if (hexMode) r += "$";
  return r + SUFFIX;
}

const MANGLED = /__TURBOPACK__([0-9A-Za-z_$]*?)__(?![0-9A-Za-z_$])/g;

// inverse of the body encoding in `mangle` (prefix and suffix already removed)
function decode(body: string): string {
  let out = "";
  let i = 0;

  while (i < body.length) {
    const c = body[i];
    if (c === "_") {
      let run = 0;
      while (body[i + run] === "_") run++;
      // a lone `_` followed by spaces encodes as an odd run
      if (run % 2 === 1) out += "_";
      out += " ".repeat(Math.floor(run / 2));
      i += run;
    } else if (c === "$") {
      if (body[i + 1] === "$") {
        out += "$";
        i += 2;
        continue;
      }
      i++;
      while (i < body.length && body[i] !== "$") {
        if (body[i] === "_") {
          const end = body.indexOf("$", i);
          out += String.fromCodePoint(parseInt(body.slice(i + 1, end), 16));
          i = end;
          break;
        }
        out += String.fromCharCode(parseInt(body.slice(i, i + 2), 16));
        i += 2;
      }
      i++;
    } else {
      out += c;
      i++;
    }
  }

  return out;
}

/**
 * Replaces every mangled identifier in `text` with its label, quoted in
 * backticks. Used to make generated code and error messages readable.
 */
export function unmangle(text: string): string {
  return text.replace(MANGLED, (_, body: string) => `\`${decode(body)}\``);
}
