import * as R from "ramda";
import { append, concat, DocCore, line, nest, nil, text, union } from "./doc";
import { flatten, group } from "./flatten";

export type DocJoiner = (x: DocCore, y: DocCore) => DocCore;

export function space(x: DocCore, y: DocCore): DocCore {
  return concat(x, text(" "), y);
}

export function newline(x: DocCore, y: DocCore): DocCore {
  return concat(x, line(), y);
}

// A single space if the rest of the line fits, otherwise a line break.
export function spaceNewline(x: DocCore, y: DocCore): DocCore {
  return concat(x, group(line()), y);
}

// foldDoc(f, [a, b, c]) === f(a, f(b, c))
export function foldDoc(f: DocJoiner, docs: DocCore[]): DocCore {
  const last = R.last(docs);
  if (last === undefined) {
    return nil();
  }
  return R.reduceRight(
    (doc: DocCore, acc: DocCore) => f(doc, acc),
    last,
    R.init(docs),
  );
}

export function spread(docs: DocCore[]): DocCore {
  return foldDoc(space, docs);
}

export function stack(docs: DocCore[]): DocCore {
  return foldDoc(newline, docs);
}

/**
 * `open`, then `content` and `close` on one line if everything fits.
 * Otherwise `content` goes on its own lines indented by 2 and `close` on a
 * line after it.
 */
export function bracket(
  open: string,
  content: DocCore,
  close: string,
): DocCore {
  return group(
    concat(text(open), nest(2, append(line(), content)), line(), text(close)),
  );
}

export function fillWords(words: string): DocCore {
  return foldDoc(
    spaceNewline,
    words.split(" ").map((word) => text(word)),
  );
}

/**
 * Like fillWords, but for arbitrary documents. Each separator is a space if
 * the next document fits flattened on the current line, otherwise a line
 * break.
 *
 * Every suffix of the list has two continuations, one starting with its first
 * document flattened and one starting with it as-is. Building them back to
 * front lets both alternatives of each union share the continuations of the
 * next suffix instead of rebuilding them.
 */
export function fill(docs: DocCore[]): DocCore {
  const last = R.last(docs);
  if (last === undefined) {
    return nil();
  }
  let flatTail = flatten(last);
  let plainTail = last;
  for (let i = docs.length - 2; i >= 0; i--) {
    const head = docs[i];
    const flatHead = flatten(head);
    const staysOnLine = space(flatHead, flatTail);
    const nextFlatTail = union(staysOnLine, newline(flatHead, plainTail));
    plainTail = union(staysOnLine, newline(head, plainTail));
    flatTail = nextFlatTail;
  }
  return plainTail;
}
