const HTML_ESCAPES: Record<string, string> = { "&": "&amp;", "<": "&lt;", ">": "&gt;", '"': "&quot;" };

export function escapeHtml(text: string): string {
  return String(text ?? "").replace(/[&<>"]/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function brief(text: string, max = 160): string {
  const t = String(text ?? "").replace(/\s+/g, " ").trim();
  if (t.length <= max) return t;
  return `${t.slice(0, max)}…`;
}

/** Splits a message at paragraph or line boundaries so no chunk exceeds `maxChars`. */
export function splitChatText(text: string, maxChars: number): string[] {
  const raw = String(text ?? "");
  if (raw.length <= maxChars) return [raw];

  const chunks: string[] = [];
  let rest = raw;
  while (rest.length > maxChars) {
    const window = rest.slice(0, maxChars);
    let cut = window.lastIndexOf("\n\n");
    if (cut <= 0) cut = window.lastIndexOf("\n");
    if (cut <= 0) cut = window.lastIndexOf(" ");
    if (cut <= 0) cut = maxChars;
    chunks.push(rest.slice(0, cut).trimEnd());
    rest = rest.slice(cut).replace(/^\s+/, "");
  }
  if (rest) chunks.push(rest);
  return chunks;
}

export function parseCommand(text: string): { name: string; args: string } | null {
  const m = String(text ?? "").trim().match(/^\/([A-Za-z0-9_]+)(?:@[A-Za-z0-9_]+)?(?:\s+([\s\S]*))?$/);
  if (!m) return null;
  return { name: m[1].toLowerCase(), args: (m[2] ?? "").trim() };
}
