/*
 * Generates docs/API.md from the JSDoc of every exported declaration under src/.
 * - Module summaries come from the comment carrying a `@module` tag.
 * - Declarations and class members tagged `@internal` are skipped.
 * Usage: npm run docs
 */
import {
  Node,
  Project,
  Scope,
  type ClassDeclaration,
  type JSDoc,
  type SourceFile,
} from 'ts-morph';
import fg from 'fast-glob';
import * as path from 'path';
import fs from 'fs-extra';

const ROOT_DIR = path.resolve('.');
const SRC_DIR = path.resolve('src');
const DOCS_DIR = path.resolve('docs');

export interface DocEntry {
  kind: string;
  name: string;
  signature?: string;
  summary?: string;
  members: DocEntry[];
}

export interface ModuleDoc {
  /** Path relative to the project root, forward slashes. */
  file: string;
  summary?: string;
  entries: DocEntry[];
}

function isModuleDoc(doc: JSDoc): boolean {
  return doc.getTags().some((t) => t.getTagName() === 'module');
}

function isInternal(docs: JSDoc[]): boolean {
  return docs.some((d) => d.getTags().some((t) => t.getTagName() === 'internal'));
}

/** First paragraph of a JSDoc description, whitespace collapsed. */
function firstParagraph(doc: JSDoc | undefined): string | undefined {
  const text = doc?.getDescription().trim();
  if (!text) return undefined;
  return text.split(/\r?\n\s*\r?\n/)[0].replace(/\s+/g, ' ').trim();
}

/** Declaration docs, ignoring a file-level `@module` comment stacked above them. */
function ownDocs(docs: JSDoc[]): JSDoc[] {
  return docs.filter((d) => !isModuleDoc(d));
}

function describeClassMembers(decl: ClassDeclaration): DocEntry[] {
  const members: DocEntry[] = [];
  for (const member of decl.getMembers()) {
    if (
      !Node.isMethodDeclaration(member) &&
      !Node.isGetAccessorDeclaration(member) &&
      !Node.isPropertyDeclaration(member)
    ) {
      continue;
    }
    if (member.getScope() !== Scope.Public) continue;
    const docs = member.getJsDocs();
    if (isInternal(docs)) continue;
    const name = member.getName();
    const isStatic = member.isStatic();
    let kind: string;
    let signature: string | undefined;
    if (Node.isMethodDeclaration(member)) {
      kind = isStatic ? 'static method' : 'method';
      const params = member.getParameters().map((p) => p.getText()).join(', ');
      const ret = member.getReturnTypeNode()?.getText();
      signature = `${name}(${params})${ret ? `: ${ret}` : ''}`;
    } else if (Node.isGetAccessorDeclaration(member)) {
      kind = 'getter';
    } else {
      kind = isStatic ? 'static property' : 'property';
    }
    members.push({
      kind,
      name,
      signature,
      summary: firstParagraph(docs[docs.length - 1]),
      members: [],
    });
  }
  return members;
}

function describeDeclaration(exportName: string, decl: Node): DocEntry | undefined {
  if (Node.isFunctionDeclaration(decl)) {
    const docs = ownDocs(decl.getJsDocs());
    if (isInternal(docs)) return undefined;
    const name = decl.getName() ?? exportName;
    const params = decl.getParameters().map((p) => p.getText()).join(', ');
    const ret = decl.getReturnTypeNode()?.getText();
    return {
      kind: 'function',
      name,
      signature: `${name}(${params})${ret ? `: ${ret}` : ''}`,
      summary: firstParagraph(docs[docs.length - 1]),
      members: [],
    };
  }
  if (Node.isClassDeclaration(decl)) {
    const docs = ownDocs(decl.getJsDocs());
    if (isInternal(docs)) return undefined;
    return {
      kind: 'class',
      name: decl.getName() ?? exportName,
      summary: firstParagraph(docs[docs.length - 1]),
      members: describeClassMembers(decl),
    };
  }
  if (
    Node.isInterfaceDeclaration(decl) ||
    Node.isTypeAliasDeclaration(decl) ||
    Node.isEnumDeclaration(decl)
  ) {
    const docs = ownDocs(decl.getJsDocs());
    if (isInternal(docs)) return undefined;
    const kind = Node.isInterfaceDeclaration(decl)
      ? 'interface'
      : Node.isEnumDeclaration(decl)
        ? 'enum'
        : 'type';
    return {
      kind,
      name: decl.getName(),
      summary: firstParagraph(docs[docs.length - 1]),
      members: [],
    };
  }
  if (Node.isVariableDeclaration(decl)) {
    // JSDoc sits on the enclosing `export const` statement
    const docs = ownDocs(decl.getVariableStatement()?.getJsDocs() ?? []);
    if (isInternal(docs)) return undefined;
    return {
      kind: 'const',
      name: decl.getName(),
      summary: firstParagraph(docs[docs.length - 1]),
      members: [],
    };
  }
  return undefined;
}

/**
 * Collect the documented surface of one source file. Re-exports from other files are
 * left to the file that declares them.
 */
export function collectModuleDocs(sf: SourceFile, rootDir: string = ROOT_DIR): ModuleDoc {
  let summary: string | undefined;
  for (const statement of sf.getStatements()) {
    if (!Node.isJSDocable(statement)) continue;
    const moduleDoc = statement.getJsDocs().find(isModuleDoc);
    if (moduleDoc) {
      summary = firstParagraph(moduleDoc);
      break;
    }
  }

  const entries: DocEntry[] = [];
  for (const [exportName, decls] of sf.getExportedDeclarations()) {
    for (const decl of decls) {
      if (decl.getSourceFile() !== sf) continue;
      const entry = describeDeclaration(exportName, decl);
      if (entry) entries.push(entry);
    }
  }
  entries.sort((a, b) => a.name.localeCompare(b.name));

  const file = path.posix.relative(
    rootDir.replace(/\\/g, '/'),
    sf.getFilePath().replace(/\\/g, '/')
  );
  return { file, summary, entries };
}

/** Render collected modules as a single Markdown page, files sorted by path. */
export function renderApiMarkdown(modules: ModuleDoc[], title = 'API Reference'): string {
  const lines: string[] = [`# ${title}`, ''];
  const sorted = [...modules].sort((a, b) => a.file.localeCompare(b.file));
  for (const mod of sorted) {
    if (!mod.entries.length && !mod.summary) continue;
    lines.push(`## ${mod.file}`, '');
    if (mod.summary) lines.push(mod.summary, '');
    for (const entry of mod.entries) {
      lines.push(`### ${entry.name}`, '');
      lines.push(entry.signature ? `_${entry.kind}_ \`${entry.signature}\`` : `_${entry.kind}_`, '');
      if (entry.summary) lines.push(entry.summary, '');
      for (const m of entry.members) {
        lines.push(`- \`${m.signature ?? m.name}\` (${m.kind})${m.summary ? `: ${m.summary}` : ''}`);
      }
      if (entry.members.length) lines.push('');
    }
  }
  return lines.join('\n').trim() + '\n';
}

async function writeIfChanged(file: string, content: string): Promise<boolean> {
  if (await fs.pathExists(file)) {
    const prev = await fs.readFile(file, 'utf8');
    if (prev === content) return false;
  }
  await fs.writeFile(file, content, 'utf8');
  return true;
}

async function main(): Promise<void> {
  const project = new Project({
    tsConfigFilePath: path.resolve('tsconfig.json'),
    skipAddingFilesFromTsConfig: true,
  });
  const filePaths = await fg(['**/*.ts'], { cwd: SRC_DIR, absolute: true, ignore: ['**/*.d.ts'] });
  const modules = filePaths
    .sort()
    .map((p) => collectModuleDocs(project.addSourceFileAtPath(p)));
  console.log(`[docs] Loaded ${modules.length} source files`);

  await fs.ensureDir(DOCS_DIR);
  const outFile = path.join(DOCS_DIR, 'API.md');
  const written = await writeIfChanged(outFile, renderApiMarkdown(modules));
  console.log(`[docs] ${written ? 'Wrote' : 'Unchanged'} ${path.relative(ROOT_DIR, outFile)}`);
}

if (require.main === module) {
  main().catch((e: unknown) => {
    console.error(e);
    process.exit(1);
  });
}
