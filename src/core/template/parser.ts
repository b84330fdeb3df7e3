/**
 * Template compiler.
 *
 * Syntax:
 *   {{ name }}  {{ name | slug | upper }}   placeholder with filters
 *   {{#if predicate}} ... {{else}} ... {{/if}}
 *   {{#raw}} ... {{/raw}}                    emitted verbatim
 *
 * A block tag alone on its line takes the whole line with it, so block
 * structure does not leave blank lines in the output.
 */
import { TemplateError, ErrorCodes } from '../../utils/errors.js';
import { parsePredicate } from '../predicates/parser.js';
import type { Predicate } from '../predicates/types.js';
import { isFilterName, type FilterName } from './filters.js';
import type { CompiledTemplate, TemplateNode } from './types.js';

type Tag =
  | { kind: 'placeholder'; name: string; filters: FilterName[] }
  | { kind: 'if'; condition: string; predicate: Predicate }
  | { kind: 'else' }
  | { kind: 'endif' }
  | { kind: 'raw' }
  | { kind: 'endraw' };

type Segment =
  | { type: 'text'; text: string }
  | { type: 'tag'; tag: Tag; raw: string; line: number };

interface IfFrame {
  condition: string;
  predicate: Predicate;
  line: number;
  then: TemplateNode[];
  otherwise: TemplateNode[];
  inElse: boolean;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const RAW_END = /\{\{\s*\/raw\s*\}\}/g;

export function compileTemplate(text: string, origin: string): CompiledTemplate {
  const segments = stripStandaloneLines(scan(text, origin));
  return { origin, nodes: buildTree(segments, origin) };
}

/**
 * Split text into literal runs and tags. Raw block bodies become plain text.
 */
function scan(text: string, origin: string): Segment[] {
  const segments: Segment[] = [];
  let pos = 0;
  let line = 1;

  const pushText = (chunk: string): void => {
    if (chunk.length > 0) {
      segments.push({ type: 'text', text: chunk });
      line += countNewlines(chunk);
    }
  };

  while (pos < text.length) {
    const open = text.indexOf('{{', pos);
    if (open === -1) {
      pushText(text.slice(pos));
      break;
    }
    pushText(text.slice(pos, open));

    const close = text.indexOf('}}', open + 2);
    if (close === -1) {
      throw syntaxError(origin, line, 'unterminated tag', text.slice(open, open + 20));
    }

    const raw = text.slice(open, close + 2);
    const tag = parseTag(text.slice(open + 2, close).trim(), raw, origin, line);
    segments.push({ type: 'tag', tag, raw, line });
    line += countNewlines(raw);
    pos = close + 2;

    if (tag.kind === 'raw') {
      RAW_END.lastIndex = pos;
      const end = RAW_END.exec(text);
      if (!end) {
        throw syntaxError(origin, line, 'unterminated raw block', raw);
      }
      pushText(text.slice(pos, end.index));
      segments.push({ type: 'tag', tag: { kind: 'endraw' }, raw: end[0], line });
      pos = end.index + end[0].length;
    }
  }

  return segments;
}

function parseTag(content: string, raw: string, origin: string, line: number): Tag {
  if (content === '') {
    throw syntaxError(origin, line, 'empty tag', raw);
  }

  if (content.startsWith('#if')) {
    const condition = content.slice(3).trim();
    if (condition === '' || !/^#if\s/.test(content)) {
      throw syntaxError(origin, line, 'missing condition', raw);
    }
    return { kind: 'if', condition, predicate: parsePredicate(condition, `${origin}:${line}`) };
  }

  switch (content) {
    case 'else':
      return { kind: 'else' };
    case '/if':
      return { kind: 'endif' };
    case '#raw':
      return { kind: 'raw' };
    case '/raw':
      // Paired closers are consumed while scanning the raw body.
      throw syntaxError(origin, line, 'closing tag without an open raw block', raw);
  }

  if (content.startsWith('#') || content.startsWith('/')) {
    throw syntaxError(origin, line, 'unknown block tag', raw);
  }

  const [name, ...filterNames] = content.split('|').map((part) => part.trim());
  if (!IDENTIFIER.test(name)) {
    throw syntaxError(origin, line, 'invalid placeholder', raw);
  }

  const filters: FilterName[] = [];
  for (const filter of filterNames) {
    if (!isFilterName(filter)) {
      throw new TemplateError(
        ErrorCodes.UNKNOWN_FILTER,
        `${origin}:${line}: unknown filter '${filter}' in '${raw}'`,
        { origin, line, token: raw, filter }
      );
    }
    filters.push(filter);
  }

  return { kind: 'placeholder', name, filters };
}

/**
 * Drop the indentation and line break around block tags that sit alone on their line.
 */
function stripStandaloneLines(segments: Segment[]): Segment[] {
  const texts = segments.map((segment) => (segment.type === 'text' ? segment.text : ''));
  const standalone = segments.map((_, index) => isStandalone(segments, index));

  standalone.forEach((isAlone, index) => {
    if (!isAlone) return;
    if (index > 0 && segments[index - 1].type === 'text') {
      texts[index - 1] = texts[index - 1].replace(/[ \t]*$/, '');
    }
    if (index + 1 < segments.length && segments[index + 1].type === 'text') {
      texts[index + 1] = texts[index + 1].replace(/^[ \t]*(\r?\n)?/, '');
    }
  });

  return segments
    .map((segment, index): Segment =>
      segment.type === 'text' ? { type: 'text', text: texts[index] } : segment
    )
    .filter((segment) => segment.type === 'tag' || segment.text.length > 0);
}

function isStandalone(segments: Segment[], index: number): boolean {
  const segment = segments[index];
  if (segment.type !== 'tag' || segment.tag.kind === 'placeholder') {
    return false;
  }

  const prev = index > 0 ? segments[index - 1] : undefined;
  const next = index + 1 < segments.length ? segments[index + 1] : undefined;

  const startsLine =
    prev === undefined ||
    (prev.type === 'text' &&
      (/\n[ \t]*$/.test(prev.text) || (index - 1 === 0 && /^[ \t]*$/.test(prev.text))));

  const endsLine =
    next === undefined ||
    (next.type === 'text' &&
      (/^[ \t]*\r?\n/.test(next.text) ||
        (index + 1 === segments.length - 1 && /^[ \t]*$/.test(next.text))));

  return startsLine && endsLine;
}

function buildTree(segments: Segment[], origin: string): TemplateNode[] {
  const root: TemplateNode[] = [];
  const stack: IfFrame[] = [];

  const target = (): TemplateNode[] => {
    const frame = stack[stack.length - 1];
    if (!frame) return root;
    return frame.inElse ? frame.otherwise : frame.then;
  };

  for (const segment of segments) {
    if (segment.type === 'text') {
      target().push({ kind: 'text', text: segment.text });
      continue;
    }

    const { tag, raw, line } = segment;
    switch (tag.kind) {
      case 'placeholder':
        target().push({ kind: 'placeholder', name: tag.name, filters: tag.filters, token: raw, line });
        break;
      case 'if':
        stack.push({
          condition: tag.condition,
          predicate: tag.predicate,
          line,
          then: [],
          otherwise: [],
          inElse: false,
        });
        break;
      case 'else': {
        const frame = stack[stack.length - 1];
        if (!frame || frame.inElse) {
          throw syntaxError(origin, line, frame ? 'duplicate else' : 'else outside of an if block', raw);
        }
        frame.inElse = true;
        break;
      }
      case 'endif': {
        const frame = stack.pop();
        if (!frame) {
          throw syntaxError(origin, line, 'closing tag without an open if block', raw);
        }
        target().push({
          kind: 'if',
          predicate: frame.predicate,
          condition: frame.condition,
          then: frame.then,
          otherwise: frame.otherwise,
          line: frame.line,
        });
        break;
      }
      case 'raw':
      case 'endraw':
        break;
    }
  }

  const unclosed = stack[stack.length - 1];
  if (unclosed) {
    throw syntaxError(origin, unclosed.line, 'unclosed if block', `{{#if ${unclosed.condition}}}`);
  }

  return root;
}

function countNewlines(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === '\n') count++;
  }
  return count;
}

function syntaxError(origin: string, line: number, problem: string, token: string): TemplateError {
  return new TemplateError(
    ErrorCodes.TEMPLATE_SYNTAX,
    `${origin}:${line}: ${problem} in '${token}'`,
    { origin, line, token }
  );
}
