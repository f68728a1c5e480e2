import type { SymbolName } from '../common/types';

export type DescriptorKind = 'term' | 'type' | 'method';

export interface GlobalDescriptor {
  /** Owner prefix including its trailing terminator, e.g. `pkg.` or `pkg/Foo#`. */
  owner: string;
  /** Raw descriptor name, backticks kept when the name is quoted. */
  name: string;
  kind: DescriptorKind;
}

const DELIMITERS = new Set(['.', '#', '/', '(', ')', '[', ']']);

export function isGlobalSymbol(symbol: SymbolName): boolean {
  return symbol.endsWith('.') || symbol.endsWith('#');
}

/**
 * Splits the last descriptor off a global symbol. Returns null for local
 * symbols and for text that does not follow the SemanticDB symbol syntax.
 */
export function parseGlobalSymbol(symbol: SymbolName): GlobalDescriptor | null {
  if (!isGlobalSymbol(symbol)) {
    return null;
  }

  const body = symbol.slice(0, -1);
  let kind: DescriptorKind = symbol.endsWith('#') ? 'type' : 'term';
  let nameEnd = body.length;

  if (kind === 'term' && body.endsWith(')')) {
    const open = body.lastIndexOf('(');
    if (open < 0) {
      return null;
    }
    kind = 'method';
    nameEnd = open;
  }

  const nameStart = findNameStart(body, nameEnd);
  if (nameStart < 0 || nameStart === nameEnd) {
    return null;
  }

  return {
    owner: body.slice(0, nameStart),
    name: body.slice(nameStart, nameEnd),
    kind,
  };
}

/**
 * The counterpart of a term or type symbol in the other namespace:
 * `pkg.Foo.` for `pkg.Foo#` and back. Methods have no sibling.
 */
export function namespaceSibling(symbol: SymbolName): SymbolName | null {
  const descriptor = parseGlobalSymbol(symbol);
  if (!descriptor) {
    return null;
  }

  switch (descriptor.kind) {
    case 'type':
      return `${descriptor.owner}${descriptor.name}.`;
    case 'term':
      return `${descriptor.owner}${descriptor.name}#`;
    default:
      return null;
  }
}

function findNameStart(body: string, end: number): number {
  if (end > 0 && body[end - 1] === '`') {
    return body.lastIndexOf('`', end - 2);
  }

  let index = end;
  while (index > 0 && !DELIMITERS.has(body[index - 1])) {
    index--;
  }
  return index;
}
