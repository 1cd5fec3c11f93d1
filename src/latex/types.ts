/**
 * LaTeX Pipeline Types
 */

/**
 * Where a chunk came from in the document
 */
export enum ChunkContext {
  TITLE = 'title',
  SECTION = 'section',
  PARAGRAPH = 'paragraph',
  CAPTION = 'caption',
  ABSTRACT = 'abstract',
  ENVIRONMENT = 'environment',
  PROTECTED = 'protected',
}

const CHUNK_CONTEXTS = new Set<string>(Object.values(ChunkContext));

export function isChunkContext(value: unknown): value is ChunkContext {
  return typeof value === 'string' && CHUNK_CONTEXTS.has(value);
}

/**
 * A unit of text designated for independent translation
 */
export interface Chunk {
  readonly id: string;
  readonly content: string;
  readonly context: ChunkContext;
  /** placeholder -> original LaTeX */
  readonly preservedElements: Readonly<Record<string, string>>;
  /** Attached externally, consulted only by reconstruct() */
  translation?: string;
}

/**
 * JSON form of a parsed document (for persistence and the HTTP service)
 */
export interface SerializedDocument {
  preamble: string;
  bodyTemplate: string;
  chunks: Array<{
    id: string;
    content: string;
    context: ChunkContext;
    preservedElements: Record<string, string>;
    translation?: string;
  }>;
}

/**
 * chunk id -> translated text; absent ids fall back to the source
 */
export type TranslationMap = Record<string, string> | Map<string, string>;

/**
 * Additive overrides accepted by parse()
 */
export interface ParserOptions {
  extraProtectedEnvironments?: string[];
  extraTranslatableEnvironments?: string[];
  preserveTerms?: string[];
  minParagraphLength?: number;
}

/**
 * Fully resolved parser configuration
 */
export interface ParserConfig {
  protectedEnvironments: ReadonlySet<string>;
  translatableEnvironments: ReadonlySet<string>;
  verbatimEnvironments: ReadonlySet<string>;
  authorCommands: readonly string[];
  preserveTerms: readonly string[];
  minParagraphLength: number;
}

export const DEFAULT_PROTECTED_ENVIRONMENTS: readonly string[] = [
  // math displays
  'equation',
  'equation*',
  'align',
  'align*',
  'alignat',
  'alignat*',
  'flalign',
  'flalign*',
  'gather',
  'gather*',
  'multline',
  'multline*',
  'eqnarray',
  'eqnarray*',
  'split',
  'math',
  'displaymath',
  // code and drawings
  'verbatim',
  'verbatim*',
  'Verbatim',
  'lstlisting',
  'minted',
  'comment',
  'tikzpicture',
  'algorithm',
  'algorithmic',
  // floats and tables
  'figure',
  'figure*',
  'table',
  'table*',
  'tabular',
  'tabular*',
  'tabularx',
  'longtable',
  'thebibliography',
];

export const DEFAULT_TRANSLATABLE_ENVIRONMENTS: readonly string[] = [
  'abstract',
  'quote',
  'quotation',
  'itemize',
  'enumerate',
  'description',
];

/** Environments whose body is raw text: the first \end{name} closes them */
export const VERBATIM_ENVIRONMENTS: readonly string[] = [
  'verbatim',
  'verbatim*',
  'Verbatim',
  'lstlisting',
  'minted',
  'comment',
];

export const DEFAULT_AUTHOR_COMMANDS: readonly string[] = [
  'author',
  'affiliation',
  'institute',
  'email',
];

export const DEFAULT_MIN_PARAGRAPH_LENGTH = 20;

/**
 * Merge additive overrides onto the defaults.
 * An environment named both protected and translatable is translatable.
 */
export function resolveParserConfig(options: ParserOptions = {}): ParserConfig {
  const translatable = new Set([
    ...DEFAULT_TRANSLATABLE_ENVIRONMENTS,
    ...(options.extraTranslatableEnvironments ?? []),
  ]);

  const protectedEnvs = new Set<string>();
  for (const env of [
    ...DEFAULT_PROTECTED_ENVIRONMENTS,
    ...(options.extraProtectedEnvironments ?? []),
  ]) {
    if (!translatable.has(env)) {
      protectedEnvs.add(env);
    }
  }

  const minParagraphLength =
    options.minParagraphLength !== undefined &&
    Number.isFinite(options.minParagraphLength) &&
    options.minParagraphLength >= 0
      ? options.minParagraphLength
      : DEFAULT_MIN_PARAGRAPH_LENGTH;

  return {
    protectedEnvironments: protectedEnvs,
    translatableEnvironments: translatable,
    verbatimEnvironments: new Set(VERBATIM_ENVIRONMENTS),
    authorCommands: DEFAULT_AUTHOR_COMMANDS,
    preserveTerms: (options.preserveTerms ?? [])
      .map((term) => term.trim())
      .filter((term) => term.length > 0),
    minParagraphLength,
  };
}
