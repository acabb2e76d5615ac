/**
 * Tokenizer and tree builder for OFX 1.x SGML and OFX 2.x XML bodies.
 *
 * SGML leaf elements carry a value and no closing tag (`<TRNAMT>-10.00`); aggregates
 * are always closed. An explicit close after a leaf (`<TRNAMT>-10.00</TRNAMT>`) is
 * accepted so that XML bodies parse with the same code.
 */

import { OfxParseError } from './errors.js';
import { decodeEntities } from './values.js';

export interface OfxElement {
  name: string;
  /** Text content for leaves, null for aggregates */
  value: string | null;
  children: OfxElement[];
}

export interface OfxBody {
  /** Attributes of an `<?OFX ...?>` processing instruction (OFX 2.x) */
  instructions: Record<string, string>;
  root: OfxElement;
}

const TOKEN = /<(\/?)([A-Za-z0-9_.]+)\s*>|<\?([\s\S]*?)\?>|<!([\s\S]*?)>/g;

function parseInstruction(body: string, into: Record<string, string>): void {
  const trimmed = body.trim();
  if (!/^OFX\b/i.test(trimmed)) {
    return;
  }
  for (const match of trimmed.matchAll(/([A-Za-z]+)\s*=\s*"([^"]*)"/g)) {
    const [, key, value] = match;
    if (key !== undefined && value !== undefined) {
      into[key.toUpperCase()] = value;
    }
  }
}

function closeAsLeafIfEmpty(element: OfxElement): void {
  if (element.children.length === 0 && element.value === null) {
    element.value = '';
  }
}

/**
 * An SGML element with no value and no close tag (`<CHECKNUM>` followed by `<MEMO>X`)
 * was taken for an aggregate and adopted the fields after it. Give them back to the
 * parent, right after the element, which becomes an empty leaf.
 */
function releaseAdoptedChildren(element: OfxElement, parent: OfxElement): void {
  if (element.children.length > 0) {
    const position = parent.children.indexOf(element);
    parent.children.splice(position + 1, 0, ...element.children);
    element.children = [];
  }
  element.value = '';
}

/**
 * Build the element tree of everything from the first `<`. Throws OfxParseError on
 * a closing tag with no open element and on stray text between aggregates. An
 * aggregate still open at the end of the body is an error too.
 */
export function parseOfxBody(body: string): OfxBody {
  const instructions: Record<string, string> = {};
  const document: OfxElement = { name: '#document', value: null, children: [] };
  const stack: OfxElement[] = [document];
  // leaf that may still receive an explicit XML-style close tag
  let openLeaf: OfxElement | null = null;
  let cursor = 0;

  const top = (): OfxElement => {
    const element = stack[stack.length - 1];
    if (element === undefined) {
      throw new OfxParseError('Element stack underflow');
    }
    return element;
  };

  const checkStrayText = (text: string): void => {
    if (text.trim() !== '') {
      throw new OfxParseError(`Unexpected text "${text.trim().slice(0, 40)}" inside <${top().name}>`, top().name);
    }
  };

  TOKEN.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = TOKEN.exec(body)) !== null) {
    const [token, slash, rawName, instruction] = match;
    const textBefore = body.slice(cursor, match.index);
    cursor = match.index + token.length;

    if (rawName === undefined) {
      checkStrayText(textBefore);
      if (instruction !== undefined) {
        parseInstruction(instruction, instructions);
      }
      continue;
    }

    const name = rawName.toUpperCase();

    if (slash === '/') {
      checkStrayText(textBefore);

      if (openLeaf !== null && openLeaf.name === name) {
        openLeaf = null;
        continue;
      }
      openLeaf = null;

      const index = stack.map((element) => element.name).lastIndexOf(name);
      if (index <= 0) {
        throw new OfxParseError(`Unexpected closing tag </${name}>`, name);
      }
      // anything still open above the matching element is an empty SGML leaf
      while (stack.length - 1 > index) {
        const dangling = stack.pop();
        if (dangling === undefined) break;
        releaseAdoptedChildren(dangling, top());
      }
      const closed = stack.pop();
      if (closed !== undefined) {
        closeAsLeafIfEmpty(closed);
      }
      if (name === 'OFX' && stack.length === 1) {
        break;
      }
      continue;
    }

    checkStrayText(textBefore);
    openLeaf = null;

    const element: OfxElement = { name, value: null, children: [] };
    top().children.push(element);

    const nextTag = body.indexOf('<', cursor);
    const text = body.slice(cursor, nextTag === -1 ? body.length : nextTag);
    if (text.trim() !== '') {
      element.value = decodeEntities(text.trim());
      openLeaf = element;
      cursor += text.length;
      TOKEN.lastIndex = cursor;
    } else {
      stack.push(element);
    }
  }

  while (stack.length > 1) {
    const unclosed = stack.pop();
    if (unclosed === undefined) break;
    if (unclosed.children.length > 0) {
      throw new OfxParseError(`Element <${unclosed.name}> is never closed`, unclosed.name);
    }
    closeAsLeafIfEmpty(unclosed);
  }

  return { instructions, root: document };
}

export function findChild(element: OfxElement, name: string): OfxElement | undefined {
  return element.children.find((child) => child.name === name);
}

/**
 * Depth-first search for the first element with the given name.
 */
export function findFirst(element: OfxElement, name: string): OfxElement | undefined {
  for (const child of element.children) {
    if (child.name === name) {
      return child;
    }
    const nested = findFirst(child, name);
    if (nested !== undefined) {
      return nested;
    }
  }
  return undefined;
}

export function childValue(element: OfxElement, name: string): string {
  return findChild(element, name)?.value ?? '';
}
