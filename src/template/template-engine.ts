import { ConfigError } from '../errors/errors.js';

/**
 * A small template language for request bodies. The token set is
 * closed:
 *
 * - literal text, copied as is
 * - `{{ path }}` emits the string form of a value (empty when absent)
 * - `{{ path | json }}` emits the value as JSON (`null` when absent)
 * - `{% if path %}...{% else %}...{% endif %}` keeps a block when the value is present
 *
 * Paths are dot separated (`messages.0.role`). There are no expressions,
 * assignments or loops.
 */

export type TemplateContext = Record<string, unknown>;

export type TemplateNode =
  | { type: 'text'; value: string }
  | { type: 'value'; path: string[]; json: boolean }
  | { type: 'if'; path: string[]; then: TemplateNode[]; otherwise: TemplateNode[] };

interface OpenBlock {
  node: Extract<TemplateNode, { type: 'if' }>;
  inElse: boolean;
}

const TAG = /\{\{([\s\S]*?)\}\}|\{%([\s\S]*?)%\}/g;
const PATH = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z0-9_]+)*$/;

export class TemplateEngine {
  private cache = new Map<string, TemplateNode[]>();

  render(source: string, context: TemplateContext): string {
    return renderNodes(this.compile(source), context);
  }

  /**
   * Parses a template, throwing ConfigError when it is malformed
   */
  compile(source: string): TemplateNode[] {
    const cached = this.cache.get(source);
    if (cached) {
      return cached;
    }
    const nodes = parseTemplate(source);
    this.cache.set(source, nodes);
    return nodes;
  }

  clearCache(): void {
    this.cache.clear();
  }
}

function parseTemplate(source: string): TemplateNode[] {
  const root: TemplateNode[] = [];
  const stack: OpenBlock[] = [];
  const target = (): TemplateNode[] => {
    const top = stack[stack.length - 1];
    if (!top) return root;
    return top.inElse ? top.node.otherwise : top.node.then;
  };

  let cursor = 0;
  for (const match of source.matchAll(TAG)) {
    const index = match.index ?? 0;
    if (index > cursor) {
      target().push({ type: 'text', value: source.slice(cursor, index) });
    }
    cursor = index + match[0].length;

    if (match[1] !== undefined) {
      target().push(parseValueTag(match[1].trim()));
      continue;
    }

    const words = (match[2] ?? '').trim().split(/\s+/);
    switch (words[0]) {
      case 'if': {
        if (words.length !== 2) {
          throw new ConfigError(`Malformed template tag: {% ${words.join(' ')} %}`);
        }
        const node: OpenBlock['node'] = { type: 'if', path: parsePath(words[1]), then: [], otherwise: [] };
        target().push(node);
        stack.push({ node, inElse: false });
        break;
      }
      case 'else': {
        const top = stack[stack.length - 1];
        if (!top || top.inElse || words.length !== 1) {
          throw new ConfigError('Unexpected {% else %} in template');
        }
        top.inElse = true;
        break;
      }
      case 'endif': {
        if (!stack.pop() || words.length !== 1) {
          throw new ConfigError('Unexpected {% endif %} in template');
        }
        break;
      }
      default:
        throw new ConfigError(`Unsupported template tag: {% ${words.join(' ')} %}`);
    }
  }

  if (stack.length > 0) {
    throw new ConfigError('Unclosed {% if %} block in template');
  }
  if (cursor < source.length) {
    target().push({ type: 'text', value: source.slice(cursor) });
  }
  return root;
}

function parseValueTag(expression: string): TemplateNode {
  const [rawPath, ...filters] = expression.split('|').map((part) => part.trim());
  if (filters.length > 1 || (filters.length === 1 && filters[0] !== 'json')) {
    throw new ConfigError(`Unsupported template filter in {{ ${expression} }}`);
  }
  return { type: 'value', path: parsePath(rawPath), json: filters.length === 1 };
}

function parsePath(raw: string): string[] {
  if (!PATH.test(raw)) {
    throw new ConfigError(`Invalid template path: "${raw}"`);
  }
  return raw.split('.');
}

function renderNodes(nodes: TemplateNode[], context: TemplateContext): string {
  let out = '';
  for (const node of nodes) {
    switch (node.type) {
      case 'text':
        out += node.value;
        break;
      case 'value': {
        const value = lookup(context, node.path);
        out += node.json ? JSON.stringify(value ?? null) : stringify(value);
        break;
      }
      case 'if':
        out += renderNodes(isPresent(lookup(context, node.path)) ? node.then : node.otherwise, context);
        break;
    }
  }
  return out;
}

export function lookup(context: TemplateContext, path: string[]): unknown {
  let current: unknown = context;
  for (const segment of path) {
    if (Array.isArray(current)) {
      current = /^\d+$/.test(segment) ? current[Number(segment)] : undefined;
    } else if (isRecord(current) && Object.prototype.hasOwnProperty.call(current, segment)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Zero counts as present so `{% if temperature %}` keeps a temperature of 0
 */
export function isPresent(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === '') {
    return false;
  }
  return !(Array.isArray(value) && value.length === 0);
}

function stringify(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
