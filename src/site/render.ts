export interface IndexEntry {
  title: string;
  url: string;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function documentShell(title: string, body: string[]): string {
  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '  <meta charset="utf-8">',
    '  <meta name="viewport" content="width=device-width, initial-scale=1">',
    `  <title>${escapeHtml(title)}</title>`,
    "  <style>",
    "    body { font-family: sans-serif; margin: 2rem auto; max-width: 960px; }",
    "    .gallery { display: grid; grid-template-columns: repeat(auto-fill, minmax(220px, 1fr)); gap: 1rem; }",
    "    .gallery img { width: 100%; height: auto; }",
    "  </style>",
    "</head>",
    "<body>",
    ...body,
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

/**
 * Album page: a heading and the photos in the given order. `photoRefs` are
 * URLs (already encoded) relative to the page.
 */
export function renderAlbumPage(title: string, photoRefs: readonly string[]): string {
  const body = [`  <h1>${escapeHtml(title)}</h1>`];
  if (photoRefs.length === 0) {
    body.push("  <p>No photos yet.</p>");
  } else {
    body.push('  <div class="gallery">');
    for (const ref of photoRefs) {
      body.push(`    <a href="${escapeHtml(ref)}"><img src="${escapeHtml(ref)}" alt="" loading="lazy"></a>`);
    }
    body.push("  </div>");
  }
  body.push('  <p><a href="index.html">All albums</a></p>');
  return documentShell(title, body);
}

export function renderIndexPage(title: string, entries: readonly IndexEntry[]): string {
  const body = [`  <h1>${escapeHtml(title)}</h1>`];
  body.push('  <ul class="albums">');
  for (const entry of entries) {
    body.push(`    <li><a href="${escapeHtml(entry.url)}">${escapeHtml(entry.title)}</a></li>`);
  }
  body.push("  </ul>");
  return documentShell(title, body);
}
