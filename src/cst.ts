/**
 * named-model — Concrete Syntax Tree
 *
 * The node shapes the engine reads and writes. Tokenizing named.conf is
 * done elsewhere; this module only describes the resulting tree, builds
 * new nodes, and renders nodes back to text.
 */

import { writeFile } from 'node:fs/promises';

/**
 * A recognized statement. `head` is the header text including the keyword,
 * without the body, the braces or the terminating `;`.
 * Single-line statements have no `body`.
 */
export interface Statement {
  type: 'statement';
  keyword: string;
  head: string;
  body?: ConfNode[];
}

/** Opaque text: comments, whitespace, anything the tokenizer left alone. */
export interface RawFragment {
  type: 'raw';
  text: string;
}

export type ConfNode = Statement | RawFragment;

/** An ordered node list that can be written back to storage. */
export interface ConfTree {
  nodes: ConfNode[];
  save(path: string): Promise<void>;
}

function firstWord(text: string): string {
  const match = /^\S+/.exec(text);
  return match ? match[0] : '';
}

export function isStatement(node: ConfNode): node is Statement {
  return node.type === 'statement';
}

/**
 * Build a block statement from a header and its body nodes.
 *
 * @example
 * ```ts
 * blockStatement('zone "example.com"', [simpleStatement('type primary')]);
 * ```
 */
export function blockStatement(head: string, body: ConfNode[]): Statement {
  const trimmed = head.trim();
  return { type: 'statement', keyword: firstWord(trimmed), head: trimmed, body };
}

/** Build a single-line statement from one line of text. */
export function simpleStatement(line: string): Statement {
  const trimmed = line.trim().replace(/;\s*$/, '').trimEnd();
  return { type: 'statement', keyword: firstWord(trimmed), head: trimmed };
}

export function rawFragment(text: string): RawFragment {
  return { type: 'raw', text };
}

/**
 * Remove `//`, `#` and `/* *\/` comments, leaving quoted strings alone.
 */
export function stripComments(text: string): string {
  let result = '';
  let i = 0;
  let quoted = false;

  while (i < text.length) {
    const ch = text[i];

    if (quoted) {
      result += ch;
      if (ch === '"') quoted = false;
      i++;
      continue;
    }

    if (ch === '"') {
      quoted = true;
      result += ch;
      i++;
      continue;
    }

    if (ch === '#' || (ch === '/' && text[i + 1] === '/')) {
      while (i < text.length && text[i] !== '\n') i++;
      continue;
    }

    if (ch === '/' && text[i + 1] === '*') {
      const end = text.indexOf('*/', i + 2);
      i = end === -1 ? text.length : end + 2;
      result += ' ';
      continue;
    }

    result += ch;
    i++;
  }

  return result;
}

/**
 * Render body nodes on one line: statements end in `;`, raw fragments are
 * included without their comments.
 */
export function inlineText(nodes: ConfNode[]): string {
  return nodes
    .map(node => (node.type === 'statement' ? `${statementText(node)};` : stripComments(node.text).trim()))
    .filter(part => part.length > 0)
    .join(' ');
}

/** The whole statement on one line, without the terminating `;`. */
export function statementText(stmt: Statement): string {
  if (stmt.body === undefined) return stmt.head;
  const inner = inlineText(stmt.body);
  const braces = inner ? `{ ${inner} }` : '{ }';
  return stmt.head ? `${stmt.head} ${braces}` : braces;
}

/** Everything after the keyword, braces included. */
export function argumentText(stmt: Statement): string {
  return statementText(stmt).slice(stmt.keyword.length).trim();
}

/** The body on one line, without the enclosing braces. */
export function bodyText(stmt: Statement): string {
  return stmt.body === undefined ? '' : inlineText(stmt.body);
}

function renderNode(node: ConfNode, depth: number): string {
  if (node.type === 'raw') return node.text;

  const pad = '\t'.repeat(depth);
  if (node.body === undefined) {
    return `${pad}${node.head};\n`;
  }

  const inner = node.body.map(child => renderNode(child, depth + 1)).join('');
  const head = node.head ? `${node.head} ` : '';
  return `${pad}${head}{\n${inner}${pad}};\n`;
}

/** Render nodes as named.conf text. Raw fragments are emitted verbatim. */
export function render(nodes: ConfNode[]): string {
  return nodes.map(node => renderNode(node, 0)).join('');
}

/** An in-memory tree that saves by rendering its nodes to a file. */
export function createTree(nodes: ConfNode[]): ConfTree {
  return {
    nodes,
    async save(path: string): Promise<void> {
      await writeFile(path, render(this.nodes), 'utf8');
    },
  };
}
