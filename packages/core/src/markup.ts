/**
 * Rendering for the `<color=...>text</color>` spans carried by diagnostic
 * messages. Consoles that understand the markup get it raw; terminals get
 * ANSI escapes; everything else gets plain text.
 */

export type MarkupMode = "raw" | "plain" | "ansi";

const COLOR_SPAN = /<color=([^>]+)>([\s\S]*?)<\/color>/g;

const RESET = "\u001b[0m";

const NAMED_COLORS: Record<string, string> = {
  red: "\u001b[31m",
  green: "\u001b[32m",
  yellow: "\u001b[33m",
  blue: "\u001b[34m",
  magenta: "\u001b[35m",
  cyan: "\u001b[36m",
  white: "\u001b[37m",
  grey: "\u001b[90m",
  gray: "\u001b[90m",
};

/**
 * Resolve a markup color to an SGR sequence, or null when unknown.
 */
export function colorToAnsi(color: string): string | null {
  const normalized = color.trim().toLowerCase();
  const named = NAMED_COLORS[normalized];
  if (named) return named;

  const hex = normalized.match(/^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/);
  if (hex) {
    const [r, g, b] = hex.slice(1).map((part) => parseInt(part, 16));
    return `\u001b[38;2;${r};${g};${b}m`;
  }

  return null;
}

export function stripMarkup(text: string): string {
  return text.replace(COLOR_SPAN, (_match, _color: string, inner: string) => inner);
}

export function renderMarkup(text: string, mode: MarkupMode): string {
  switch (mode) {
    case "raw":
      return text;
    case "plain":
      return stripMarkup(text);
    case "ansi":
      return text.replace(COLOR_SPAN, (_match, color: string, inner: string) => {
        const sgr = colorToAnsi(color);
        return sgr ? `${sgr}${inner}${RESET}` : inner;
      });
  }
}
