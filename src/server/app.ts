/**
 * HTTP surface over parse / reconstruct / validate
 */

import { Hono } from 'hono';
import { PlaceholderCollisionError } from '../latex/errors';
import { LaTeXDocument } from '../latex/LaTeXDocument';
import { parse } from '../latex/LaTeXParser';
import { isChunkContext, type ParserOptions, type SerializedDocument } from '../latex/types';
import { validate } from '../validator/structural-validator';
import type { ValidationRule } from '../validator/types';
import { estimateTokens } from '../utils/token-counter';

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((item) => typeof item === 'string');
}

class BadRequestError extends Error {}

function readParserOptions(value: unknown): ParserOptions {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new BadRequestError('options must be an object');
  }

  const options: ParserOptions = {};
  for (const key of [
    'extraProtectedEnvironments',
    'extraTranslatableEnvironments',
    'preserveTerms',
  ] as const) {
    const list = value[key];
    if (list === undefined) continue;
    if (!isStringArray(list)) {
      throw new BadRequestError(`options.${key} must be an array of strings`);
    }
    options[key] = list;
  }

  const min = value.minParagraphLength;
  if (min !== undefined) {
    if (typeof min !== 'number') {
      throw new BadRequestError('options.minParagraphLength must be a number');
    }
    options.minParagraphLength = min;
  }
  return options;
}

function readDocument(value: unknown): SerializedDocument {
  if (!isRecord(value)) {
    throw new BadRequestError('document must be an object');
  }
  const { preamble, bodyTemplate, chunks } = value;
  if (typeof preamble !== 'string' || typeof bodyTemplate !== 'string' || !Array.isArray(chunks)) {
    throw new BadRequestError('document needs preamble, bodyTemplate and chunks');
  }

  const entries: unknown[] = chunks;
  return {
    preamble,
    bodyTemplate,
    chunks: entries.map((chunk, index) => {
      if (
        !isRecord(chunk) ||
        typeof chunk.id !== 'string' ||
        typeof chunk.content !== 'string' ||
        !isChunkContext(chunk.context) ||
        !isStringRecord(chunk.preservedElements) ||
        (chunk.translation !== undefined && typeof chunk.translation !== 'string')
      ) {
        throw new BadRequestError(`document.chunks[${index}] is malformed`);
      }
      return {
        id: chunk.id,
        content: chunk.content,
        context: chunk.context,
        preservedElements: chunk.preservedElements,
        ...(typeof chunk.translation === 'string' ? { translation: chunk.translation } : {}),
      };
    }),
  };
}

function readRules(value: unknown): ValidationRule[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new BadRequestError('rules must be an array');
  }
  const entries: unknown[] = value;
  return entries.map((rule, index) => {
    if (
      !isRecord(rule) ||
      typeof rule.id !== 'string' ||
      typeof rule.pattern !== 'string' ||
      (rule.severity !== 'error' && rule.severity !== 'warning')
    ) {
      throw new BadRequestError(`rules[${index}] is malformed`);
    }
    return {
      id: rule.id,
      pattern: rule.pattern,
      severity: rule.severity,
      ...(typeof rule.flags === 'string' ? { flags: rule.flags } : {}),
      ...(typeof rule.description === 'string' ? { description: rule.description } : {}),
    };
  });
}

/**
 * Merge per-request options onto the configured ones; lists are additive
 */
export function mergeParserOptions(base: ParserOptions, extra: ParserOptions): ParserOptions {
  return {
    extraProtectedEnvironments: [
      ...(base.extraProtectedEnvironments ?? []),
      ...(extra.extraProtectedEnvironments ?? []),
    ],
    extraTranslatableEnvironments: [
      ...(base.extraTranslatableEnvironments ?? []),
      ...(extra.extraTranslatableEnvironments ?? []),
    ],
    preserveTerms: [...(base.preserveTerms ?? []), ...(extra.preserveTerms ?? [])],
    ...(extra.minParagraphLength !== undefined || base.minParagraphLength !== undefined
      ? { minParagraphLength: extra.minParagraphLength ?? base.minParagraphLength }
      : {}),
  };
}

export function createApp(parserDefaults: ParserOptions = {}) {
  const app = new Hono();

  app.onError((err, c) => {
    if (err instanceof BadRequestError) {
      return c.json({ error: err.message }, 400);
    }
    if (err instanceof PlaceholderCollisionError) {
      return c.json({ error: err.message }, 422);
    }
    console.error('❌ Request failed:', err);
    return c.json({ error: 'Internal server error' }, 500);
  });

  const readBody = async (req: { json: () => Promise<unknown> }): Promise<JsonRecord> => {
    let body: unknown;
    try {
      body = await req.json();
    } catch {
      throw new BadRequestError('Request body must be JSON');
    }
    if (!isRecord(body)) {
      throw new BadRequestError('Request body must be a JSON object');
    }
    return body;
  };

  // Health check
  app.get('/health', (c) => c.json({ ok: true, timestamp: new Date().toISOString() }));

  app.post('/parse', async (c) => {
    const body = await readBody(c.req);
    const source = body.source;
    if (typeof source !== 'string') {
      throw new BadRequestError('Missing source');
    }

    const options = mergeParserOptions(parserDefaults, readParserOptions(body.options));
    const document = parse(source, options);
    const translatable = document.getTranslatableChunks();

    return c.json({
      document: document.toJSON(),
      stats: {
        chunks: document.chunks.length,
        translatable: translatable.length,
        protected: document.chunks.length - translatable.length,
        tokens: estimateTokens(translatable.map((chunk) => chunk.content)),
      },
    });
  });

  app.post('/reconstruct', async (c) => {
    const body = await readBody(c.req);
    const document = LaTeXDocument.fromJSON(readDocument(body.document));

    const raw = body.translations;
    let translations: Record<string, string> | undefined;
    if (raw !== undefined) {
      if (!isStringRecord(raw)) {
        throw new BadRequestError('translations must map chunk ids to strings');
      }
      translations = raw;
    }
    const text = document.reconstruct(translations);
    return c.json({ text });
  });

  app.post('/validate', async (c) => {
    const body = await readBody(c.req);
    const { source, translation } = body;
    if (typeof source !== 'string' || typeof translation !== 'string') {
      throw new BadRequestError('Missing source or translation');
    }
    const rules = readRules(body.rules);
    return c.json(validate(source, translation, rules ? { rules } : {}));
  });

  return app;
}
