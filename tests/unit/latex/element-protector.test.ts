import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  ElementProtector,
  extractCaptions,
  protectCommands,
  protectEnvironments,
  protectInlineMath,
  protectTerms,
} from '../../../src/latex/ElementProtector';
import { ParseSession } from '../../../src/latex/ParseSession';
import { ChunkContext, resolveParserConfig, type ParserOptions } from '../../../src/latex/types';

function createSession(options: ParserOptions = {}, reserved: string[] = []): ParseSession {
  return new ParseSession(resolveParserConfig(options), new Set(reserved));
}

/** placeholder -> original, over every protected chunk */
function originals(session: ParseSession): Record<string, string> {
  const map: Record<string, string> = {};
  for (const chunk of session.finish()) {
    Object.assign(map, chunk.preservedElements);
  }
  return map;
}

describe('ElementProtector', () => {
  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  describe('environments', () => {
    it('masks a table containing a tabular as one ENV placeholder', () => {
      const session = createSession();
      const table = '\\begin{table}\n\\begin{tabular}{cc}\na & b\n\\end{tabular}\n\\end{table}';

      const result = protectEnvironments(`Before\n${table}\nAfter`, session);

      expect(result).toBe('Before\n[[ENV_1]]\nAfter');
      expect(originals(session)).toEqual({ '[[ENV_1]]': table });
    });

    it('closes verbatim at the first end regardless of nesting', () => {
      const session = createSession();
      const verbatim = '\\begin{verbatim}\n\\begin{verbatim}\n\\end{verbatim}';

      const result = protectEnvironments(`${verbatim}\ntail`, session);

      expect(result).toBe('[[ENV_1]]\ntail');
    });

    it('leaves an unterminated environment as literal text', () => {
      const session = createSession();
      const text = '\\begin{equation} x = 1';

      expect(protectEnvironments(text, session)).toBe(text);
      expect(session.placeholderCount).toBe(0);
    });

    it('honours extra protected environments', () => {
      const session = createSession({ extraProtectedEnvironments: ['theorem'] });
      const result = protectEnvironments('\\begin{theorem}P\\end{theorem}', session);

      expect(result).toBe('[[ENV_1]]');
    });
  });

  describe('inline math', () => {
    it('masks $...$, \\(...\\) and \\[...\\]', () => {
      const session = createSession();
      const result = protectInlineMath('a $x$ b \\(y\\) c \\[z\\] d', session);

      expect(result).toBe('a [[MATH_1]] b [[MATH_2]] c [[MATH_3]] d');
      expect(originals(session)).toEqual({
        '[[MATH_1]]': '$x$',
        '[[MATH_2]]': '\\(y\\)',
        '[[MATH_3]]': '\\[z\\]',
      });
    });

    it('keeps text-mode math inside \\text{} within one span', () => {
      const session = createSession();
      const math = '$\\text{if $x>0$}$';

      expect(protectInlineMath(`The value ${math} holds.`, session)).toBe(
        'The value [[MATH_1]] holds.'
      );
      expect(originals(session)).toEqual({ '[[MATH_1]]': math });
    });

    it('leaves a dollar that is not closed before a paragraph break', () => {
      const session = createSession();
      const result = protectInlineMath('Cost is $5 per unit.\n\nAnother $x$ here.', session);

      expect(result).toBe('Cost is $5 per unit.\n\nAnother [[MATH_1]] here.');
    });

    it('ignores dollars in comments and escaped dollars', () => {
      const session = createSession();
      const result = protectInlineMath('% cost $5\nPrice \\$3 and $y$.', session);

      expect(result).toBe('% cost $5\nPrice \\$3 and [[MATH_1]].');
    });

    it('masks \\verb spans', () => {
      const session = createSession();
      expect(protectInlineMath('Use \\verb|$x$| here.', session)).toBe('Use [[VERB_1]] here.');
      expect(originals(session)).toEqual({ '[[VERB_1]]': '\\verb|$x$|' });
    });

    it('masks display $$...$$', () => {
      const session = createSession();
      expect(protectInlineMath('see $$a+b$$ now', session)).toBe('see [[MATH_1]] now');
    });
  });

  describe('commands', () => {
    it('numbers placeholders in command order', () => {
      const session = createSession();
      const result = protectCommands('See \\ref{fig:one} and \\cite{smith2020}.', session);

      expect(result).toBe('See [[REF_2]] and [[CITE_1]].');
    });

    it('masks optional arguments together with the command', () => {
      const session = createSession();
      const result = protectCommands('As in \\citep[p.~3]{smith} we see.', session);

      expect(result).toBe('As in [[CITE_1]] we see.');
      expect(originals(session)).toEqual({ '[[CITE_1]]': '\\citep[p.~3]{smith}' });
    });

    it('leaves a command with an unclosed argument untouched', () => {
      const session = createSession();
      const text = 'Broken \\ref{sec and more';

      expect(protectCommands(text, session)).toBe(text);
    });

    it('skips placeholders already present in the source', () => {
      const session = createSession({}, ['[[LABEL_1]]', '[[CITE_2]]']);
      expect(protectCommands('\\label{x}', session)).toBe('[[LABEL_2]]');
    });
  });

  describe('terms', () => {
    it('masks configured terms longest first on word boundaries', () => {
      const session = createSession({ preserveTerms: ['BERT', 'RoBERTa'] });
      const result = protectTerms('We compare RoBERTa and BERT, not BERTology.', session);

      expect(result).toBe('We compare [[TERM_1]] and [[TERM_2]], not BERTology.');
    });

    it('does not match command names', () => {
      const session = createSession({ preserveTerms: ['emph'] });
      expect(protectTerms('\\emph{x} emph', session)).toBe('\\emph{x} [[TERM_1]]');
    });

    it('leaves environment names alone', () => {
      const session = createSession({ preserveTerms: ['abstract'] });
      const result = protectTerms('\\begin{abstract} abstract \\end{ abstract}', session);

      expect(result).toBe('\\begin{abstract} [[TERM_1]] \\end{ abstract}');
    });
  });

  describe('captions', () => {
    it('extracts only the caption text', () => {
      const session = createSession();
      const result = extractCaptions('\\caption[Short]{ Long text }', session);
      const [chunk] = session.finish();

      expect(chunk.context).toBe(ChunkContext.CAPTION);
      expect(chunk.content).toBe('Long text');
      expect(result).toBe(`\\caption[Short]{ {{CHUNK_${chunk.id}}} }`);
    });

    it('skips captions in verbatim environments and comments', () => {
      const session = createSession();
      const source = [
        '\\begin{lstlisting}',
        '\\caption{Inside code}',
        '\\end{lstlisting}',
        '% \\caption{Commented out}',
        '\\caption{Real caption}',
      ].join('\n');

      const result = extractCaptions(source, session);
      const chunks = session.finish();

      expect(chunks.map((chunk) => chunk.content)).toEqual(['Real caption']);
      expect(result).toBe(source.replace('Real caption', `{{CHUNK_${chunks[0].id}}}`));
    });
  });

  describe('pipeline', () => {
    it('protects math and citations inside caption chunks', () => {
      const session = createSession();
      const protector = new ElementProtector();
      const source =
        '\\begin{figure}\n\\caption{Error for $n$ samples \\cite{a}}\n\\end{figure}';

      const result = protector.protect(source, session);
      const chunks = session.finish();
      const caption = chunks.find((chunk) => chunk.context === ChunkContext.CAPTION);

      expect(result).toBe('[[ENV_1]]');
      expect(caption?.content).toBe('Error for [[MATH_2]] samples [[CITE_3]]');
    });

    it('masks author blocks', () => {
      const session = createSession();
      const result = new ElementProtector().protect('\\author{Jane Roe}\nBody', session);

      expect(result).toBe('[[AUTHOR_1]]\nBody');
    });

    it('keeps affiliation and contact macros inside one author placeholder', () => {
      const session = createSession();
      const author = '\\author[1]{Jane \\\\ \\affiliation{Univ} \\email{j@x}}';
      const result = new ElementProtector().protect(`${author}\nBody`, session);

      expect(result).toBe('[[AUTHOR_1]]\nBody');
      expect(originals(session)).toEqual({ '[[AUTHOR_1]]': author });
    });
  });
});
