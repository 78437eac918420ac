import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { TEMPLATE_KEYS, type TemplateKey } from './types';

const phraseList = z.array(z.string().trim().min(1));

const LexiconSchema = z.object({
  offensive: phraseList,
  crisis: phraseList,
  negations: phraseList,
  positive: phraseList,
  negative: phraseList,
  knownWords: phraseList,
  stopWords: phraseList,
});

export type Lexicon = z.infer<typeof LexiconSchema>;

const ResponsesSchema = z.object({
  templates: z.record(z.string(), z.array(z.string().trim().min(1))),
  escalations: z.object({
    help: phraseList,
    uncertainty: phraseList,
  }),
});

export type TemplateLibrary = {
  readonly templates: Partial<Record<TemplateKey, readonly string[]>>;
  readonly escalations: { readonly help: readonly string[]; readonly uncertainty: readonly string[] };
};

export function defaultResourcesDir(): string {
  return path.join(process.cwd(), 'data');
}

function readResource<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Invalid resource file ${file}: ${issues.join('; ')}`);
  }
  return result.data;
}

export function loadLexicon(dir = defaultResourcesDir()): Lexicon {
  return readResource(path.join(dir, 'lexicon.json'), LexiconSchema);
}

export function loadTemplateLibrary(dir = defaultResourcesDir()): TemplateLibrary {
  const parsed = readResource(path.join(dir, 'responses.json'), ResponsesSchema);
  const templates: Partial<Record<TemplateKey, readonly string[]>> = {};
  for (const key of TEMPLATE_KEYS) {
    const list = parsed.templates[key];
    if (list) templates[key] = Object.freeze([...list]);
  }
  return Object.freeze({
    templates: Object.freeze(templates),
    escalations: Object.freeze({
      help: Object.freeze([...parsed.escalations.help]),
      uncertainty: Object.freeze([...parsed.escalations.uncertainty]),
    }),
  });
}

export function templatesFor(library: TemplateLibrary, key: TemplateKey): readonly string[] {
  return library.templates[key] ?? [];
}

/** Template keys the engine can route to that have no usable entry. */
export function missingTemplateKeys(library: TemplateLibrary): TemplateKey[] {
  return TEMPLATE_KEYS.filter((key) => templatesFor(library, key).length === 0);
}

let lexiconCache: Lexicon | null = null;
let libraryCache: TemplateLibrary | null = null;

export function defaultLexicon(): Lexicon {
  if (!lexiconCache) lexiconCache = loadLexicon();
  return lexiconCache;
}

export function defaultTemplateLibrary(): TemplateLibrary {
  if (!libraryCache) libraryCache = loadTemplateLibrary();
  return libraryCache;
}
