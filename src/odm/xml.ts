import { DOMParser } from '@xmldom/xmldom';
import { AppError, ERROR_CODES } from '../core/errors';
import { logger } from '../core/logger';

const ELEMENT_NODE = 1;

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

// Comments, CDATA, processing instructions, doctype, or a start/end/empty tag
const MARKUP = /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>|<\?[\s\S]*?\?>|<!DOCTYPE[^>]*>|<(\/?)([A-Za-z_][\w.:-]*)(?:[^<>"']|"[^"]*"|'[^']*')*?(\/?)>/g;

/**
 * Tag nesting problems xmldom recovers from silently: stray `<`, end tags
 * that do not match, elements left open. Returns the first one found.
 */
export function findNestingProblem(source: string): string | undefined {
  const open: string[] = [];
  let position = 0;
  for (const match of source.matchAll(MARKUP)) {
    const index = match.index ?? 0;
    if (source.slice(position, index).includes('<')) {
      return `unexpected "<" at offset ${source.indexOf('<', position)}`;
    }
    position = index + match[0].length;

    const [, slash, name, selfClosing] = match;
    if (name === undefined || selfClosing === '/') continue;
    if (slash !== '/') {
      open.push(name);
      continue;
    }
    const expected = open.pop();
    if (expected !== name) {
      return expected === undefined
        ? `unexpected end tag </${name}>`
        : `end tag </${name}> does not close <${expected}>`;
    }
  }
  if (source.slice(position).includes('<')) {
    return `unexpected "<" at offset ${source.indexOf('<', position)}`;
  }
  const unclosed = open.pop();
  return unclosed === undefined ? undefined : `element <${unclosed}> is never closed`;
}

/** Parses an XML document, turning parser errors into `ERR_PARSE`. */
export function parseXml(source: string, what: string): Element {
  const problems: string[] = [];
  const nesting = findNestingProblem(source);
  if (nesting !== undefined) problems.push(nesting);
  const parser = new DOMParser({
    errorHandler: (level: string, msg: unknown) => {
      if (level === 'warning') {
        logger.debug({ what, msg: String(msg) }, 'XML parser warning');
        return;
      }
      problems.push(String(msg));
    },
  });

  let root: Element | null;
  try {
    root = parser.parseFromString(source, 'text/xml').documentElement;
  } catch (error) {
    problems.push(error instanceof Error ? error.message : String(error));
    root = null;
  }
  const first = problems[0];
  if (first !== undefined || !root) {
    throw new AppError(
      ERROR_CODES.ERR_PARSE,
      `Malformed XML in ${what}${first ? `: ${first.trim()}` : ''}`,
      { problems }
    );
  }
  return root;
}

export function childElements(parent: Element, name: string): Element[] {
  const result: Element[] = [];
  const nodes = parent.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes.item(i);
    if (node && isElement(node) && node.nodeName === name) result.push(node);
  }
  return result;
}

export function descendants(parent: Element, name: string): Element[] {
  const result: Element[] = [];
  const found = parent.getElementsByTagName(name);
  for (let i = 0; i < found.length; i++) {
    const el = found.item(i);
    if (el) result.push(el);
  }
  return result;
}

export function textOf(el: Element | undefined): string | undefined {
  const text = el?.textContent?.trim();
  return text ? text : undefined;
}

export function childText(parent: Element, name: string): string | undefined {
  return textOf(childElements(parent, name)[0]);
}

export function attr(el: Element, name: string): string | undefined {
  const value = el.getAttribute(name)?.trim();
  return value ? value : undefined;
}
