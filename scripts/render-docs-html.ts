/*
 * Converts every Markdown page inside docs/ into an HTML page next to it (API.md -> API.html,
 * README.md -> index.html), with heading anchors and a file/symbol table of contents.
 * Usage: npm run docs
 */
import fg from 'fast-glob';
import path from 'path';
import fs from 'fs-extra';
import { Marked } from 'marked';

const DOCS_DIR = path.resolve('docs');

export function slugify(s: string): string {
  return s
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .replace(/-{2,}/g, '-');
}

// Heading ids follow slugify() so the table of contents can link to them.
const marked = new Marked({
  renderer: {
    heading(text: string, level: number, raw: string): string {
      return `<h${level} id="${slugify(raw.trim())}">${text}</h${level}>\n`;
    },
  },
});

interface TocFile {
  file: string;
  symbols: string[];
}

/** Table of contents from `## file` and `### symbol` headings. Empty string when none. */
export function renderToc(markdown: string): string {
  const files: TocFile[] = [];
  let current: TocFile | undefined;
  for (const line of markdown.split(/\r?\n/)) {
    const fileMatch = /^##\s+(\S+\.ts)\s*$/.exec(line);
    if (fileMatch) {
      current = { file: fileMatch[1], symbols: [] };
      files.push(current);
      continue;
    }
    const symMatch = /^###\s+([A-Za-z0-9_$]+)\s*$/.exec(line);
    if (symMatch && current) current.symbols.push(symMatch[1]);
  }
  if (!files.length) return '';
  const items = files.map((f) => {
    const nested = f.symbols.length
      ? `<ul>${f.symbols.map((s) => `<li><a href="#${slugify(s)}">${s}</a></li>`).join('')}</ul>`
      : '';
    return `<li><a href="#${slugify(f.file)}">${f.file}</a>${nested}</li>`;
  });
  return `<ul class="toc">${items.join('')}</ul>`;
}

/** Full HTML document for one Markdown page. */
export async function renderPage(title: string, markdown: string): Promise<string> {
  const body = await marked.parse(markdown);
  const toc = renderToc(markdown);
  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>${title}</title>
<meta name="viewport" content="width=device-width,initial-scale=1">
<style>
body{font-family:system-ui,-apple-system,Segoe UI,Arial,sans-serif;margin:0 auto;padding:0 20px 60px;line-height:1.55;color:#222;display:grid;grid-template-columns:1fr 260px;grid-gap:32px;max-width:1100px;}
main{padding:40px 0;}
aside{position:sticky;top:0;align-self:start;max-height:100vh;overflow:auto;padding:32px 0;font-size:.85rem;}
.toc,.toc ul{list-style:none;margin:0 0 .5rem;padding-left:.5rem;}
code{background:#f5f5f5;padding:2px 4px;border-radius:4px;font-size:90%;}
a{color:#2c3963;text-decoration:none;}a:hover{text-decoration:underline;}
@media (max-width:800px){body{grid-template-columns:1fr;}aside{display:none;}}
</style>
</head>
<body>
<main>
${body}
<footer>Generated from JSDoc.</footer>
</main>
<aside>${toc}</aside>
</body>
</html>
`;
}

function htmlNameFor(mdFile: string): string {
  const base = path.basename(mdFile, '.md');
  return base.toLowerCase() === 'readme' ? 'index.html' : `${base}.html`;
}

async function main(): Promise<void> {
  const pages = await fg(['**/*.md'], { cwd: DOCS_DIR, absolute: true });
  for (const mdFile of pages) {
    const md = await fs.readFile(mdFile, 'utf8');
    const title = md.match(/^#\s+(.+)$/m)?.[1] ?? path.basename(mdFile, '.md');
    const outFile = path.join(path.dirname(mdFile), htmlNameFor(mdFile));
    await fs.writeFile(outFile, await renderPage(title, md), 'utf8');
  }
  console.log(`[docs] Rendered ${pages.length} HTML page(s).`);
}

if (require.main === module) {
  main().catch((e: unknown) => {
    console.error(e);
    process.exit(1);
  });
}
