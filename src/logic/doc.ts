export enum DocCoreKind {
  Nil,
  Append,
  Nest,
  Text,
  Line,
  Union,
}

export type DocCore =
  | NilDocCore
  | AppendDocCore
  | NestDocCore
  | TextDocCore
  | LineDocCore
  | UnionDocCore;

export interface NilDocCore {
  readonly kind: DocCoreKind.Nil;
}

export interface AppendDocCore {
  readonly kind: DocCoreKind.Append;
  readonly left: DocCore;
  readonly right: DocCore;
}

export interface NestDocCore {
  readonly kind: DocCoreKind.Nest;
  readonly amount: number;
  readonly content: DocCore;
}

export interface TextDocCore {
  readonly kind: DocCoreKind.Text;
  readonly text: string;
}

export interface LineDocCore {
  readonly kind: DocCoreKind.Line;
}

// Both branches must flatten to the same text. Only group and fill build
// unions, and both guarantee it.
export interface UnionDocCore {
  readonly kind: DocCoreKind.Union;
  readonly flat: DocCore;
  readonly broken: DocCore;
}

const nilDocCore: NilDocCore = { kind: DocCoreKind.Nil };
const lineDocCore: LineDocCore = { kind: DocCoreKind.Line };

export function nil(): DocCore {
  return nilDocCore;
}

export function append(left: DocCore, right: DocCore): DocCore {
  return { kind: DocCoreKind.Append, left, right };
}

export function nest(amount: number, content: DocCore): DocCore {
  return { kind: DocCoreKind.Nest, amount, content };
}

export function text(text: string): DocCore {
  return { kind: DocCoreKind.Text, text };
}

export function line(): DocCore {
  return lineDocCore;
}

export function union(flat: DocCore, broken: DocCore): DocCore {
  return { kind: DocCoreKind.Union, flat, broken };
}

// concat(a, b, c) === append(a, append(b, c))
export function concat(...docs: DocCore[]): DocCore {
  if (!docs.length) {
    return nil();
  }
  let result = docs[docs.length - 1];
  for (let i = docs.length - 2; i >= 0; i--) {
    result = append(docs[i], result);
  }
  return result;
}
