import { RenderExecutionError, TemplateSyntaxError } from '../errors';

const ACTION_OPEN = '{{';
const ACTION_CLOSE = '}}';
const COMMENT_OPEN = '/*';
const COMMENT_CLOSE = '*/';
const FIELD_PATTERN = /^(?:\.[A-Za-z_][A-Za-z0-9_]*)+$/;
const NO_VALUE = '<no value>';

type TemplateNode =
  | { kind: 'text'; text: string }
  | { kind: 'field'; path: readonly string[]; offset: number };

export type TemplateData = Readonly<Record<string, unknown>>;

export interface CompiledTemplate {
  readonly name: string;
  readonly nodes: readonly TemplateNode[];
}

function isSpace(char: string | undefined): boolean {
  return char === ' ' || char === '\t' || char === '\r' || char === '\n';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Parses `{{.Field}}` substitutions, `{{.}}` (the whole data record), comment actions and the `{{- ` / ` -}}`
 * whitespace trim markers. Anything else inside an action is a syntax error.
 */
export function compileTemplate(text: string, name = 'Body'): CompiledTemplate {
  const nodes: TemplateNode[] = [];
  let pos = 0;
  let trimNext = false;

  const pushText = (chunk: string) => {
    if (chunk) nodes.push({ kind: 'text', text: chunk });
  };

  while (pos < text.length) {
    const open = text.indexOf(ACTION_OPEN, pos);
    if (open === -1) break;

    let chunk = text.slice(pos, open);
    if (trimNext) chunk = chunk.trimStart();

    let innerStart = open + ACTION_OPEN.length;
    if (text[innerStart] === '-' && isSpace(text[innerStart + 1])) {
      chunk = chunk.trimEnd();
      innerStart += 1;
    }

    let searchFrom = innerStart;
    const commentStart = text.slice(innerStart).trimStart().startsWith(COMMENT_OPEN);
    if (commentStart) {
      const commentEnd = text.indexOf(COMMENT_CLOSE, innerStart);
      if (commentEnd === -1) {
        throw new TemplateSyntaxError(name, open, 'unclosed comment');
      }
      searchFrom = commentEnd + COMMENT_CLOSE.length;
    }

    const close = text.indexOf(ACTION_CLOSE, searchFrom);
    if (close === -1) {
      throw new TemplateSyntaxError(name, open, 'unclosed action');
    }

    let inner = text.slice(innerStart, close);
    const trimAfter = inner.length >= 2 && inner.endsWith('-') && isSpace(inner[inner.length - 2]);
    if (trimAfter) inner = inner.slice(0, -1);
    const body = inner.trim();

    pushText(chunk);
    if (!body) {
      throw new TemplateSyntaxError(name, open, 'missing value for command');
    }
    if (body.startsWith(COMMENT_OPEN)) {
      if (!body.endsWith(COMMENT_CLOSE)) {
        throw new TemplateSyntaxError(name, open, 'comment ends before closing delimiter');
      }
    } else if (body === '.') {
      nodes.push({ kind: 'field', path: [], offset: open });
    } else if (FIELD_PATTERN.test(body)) {
      nodes.push({ kind: 'field', path: body.slice(1).split('.'), offset: open });
    } else {
      throw new TemplateSyntaxError(name, open, `unsupported action ${JSON.stringify(body)}`);
    }

    trimNext = trimAfter;
    pos = close + ACTION_CLOSE.length;
  }

  const tail = text.slice(pos);
  pushText(trimNext ? tail.trimStart() : tail);

  return { name, nodes };
}

/** Dotted field references in the order they first appear. */
export function referencedFields(template: CompiledTemplate): string[] {
  const seen = new Set<string>();
  for (const node of template.nodes) {
    if (node.kind === 'field' && node.path.length > 0) seen.add(node.path.join('.'));
  }
  return [...seen];
}

function formatValue(value: unknown): string {
  if (value === undefined || value === null) return NO_VALUE;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function resolveField(template: CompiledTemplate, data: TemplateData, path: readonly string[]): unknown {
  let current: unknown = data;
  for (const segment of path) {
    if (!isRecord(current) || !Object.hasOwn(current, segment)) {
      throw new RenderExecutionError(template.name, `.${path.join('.')}`, `can't evaluate field ${segment}`);
    }
    current = current[segment];
  }
  return current;
}

export function renderTemplate(template: CompiledTemplate, data: TemplateData): string {
  let out = '';
  for (const node of template.nodes) {
    out += node.kind === 'text' ? node.text : formatValue(resolveField(template, data, node.path));
  }
  return out;
}
