export enum DocKind {
  Nil,
  Text,
  Line,
}

// A layout with every choice already made: text fragments and line breaks
// with a fixed indentation.
export type Doc = NilDoc | TextDoc | LineDoc;

export interface NilDoc {
  readonly kind: DocKind.Nil;
}

export interface TextDoc {
  readonly kind: DocKind.Text;
  readonly text: string;
  readonly rest: Doc;
}

export interface LineDoc {
  readonly kind: DocKind.Line;
  readonly indent: number;
  readonly rest: Doc;
}

const nilDocValue: NilDoc = { kind: DocKind.Nil };

export function nilDoc(): Doc {
  return nilDocValue;
}

export function textDoc(text: string, rest: Doc): Doc {
  return { kind: DocKind.Text, text, rest };
}

export function lineDoc(indent: number, rest: Doc): Doc {
  return { kind: DocKind.Line, indent, rest };
}
