/**
 * Minimal regex-based HTML helpers for the Pokédex crawler. Pages are small,
 * server-rendered and stable, so no DOM is built.
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  eacute: "é",
  rarr: "→",
  times: "×",
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
    if (body.startsWith("#")) {
      const hex = body[1] === "x" || body[1] === "X";
      const code = parseInt(body.slice(hex ? 2 : 1), hex ? 16 : 10);
      return code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });
}

/** Visible text of an HTML fragment, whitespace collapsed. */
export function textOf(html: string): string {
  const stripped = html
    .replace(/<script[\s\S]*?<\/script>/gi, " ")
    .replace(/<style[\s\S]*?<\/style>/gi, " ")
    .replace(/<br\s*\/?>/gi, " ")
    .replace(/<[^>]+>/g, "");
  return decodeEntities(stripped).replace(/\s+/g, " ").trim();
}

/** Every match of `pattern`'s first capture group. `pattern` must be global. */
export function captureAll(html: string, pattern: RegExp): string[] {
  const out: string[] = [];
  for (const match of html.matchAll(pattern)) {
    const group = match[1];
    if (group !== undefined) {
      out.push(group);
    }
  }
  return out;
}

export function attribute(tag: string, name: string): string | undefined {
  const match = tag.match(new RegExp(`\\s${name}\\s*=\\s*"([^"]*)"`, "i"));
  const value = match?.[1];
  return value === undefined ? undefined : decodeEntities(value);
}

/** Slice of `html` from `marker` up to the next `endMarker` (or the end). */
export function sectionAfter(
  html: string,
  marker: string,
  endMarker: string
): string {
  const start = html.indexOf(marker);
  if (start === -1) {
    return "";
  }
  const end = html.indexOf(endMarker, start + marker.length);
  return html.slice(start, end === -1 ? undefined : end);
}
