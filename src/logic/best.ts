import * as R from "ramda";
import { DocCore, DocCoreKind } from "./doc";
import { Doc, lineDoc, nilDoc, textDoc } from "./resolved";
import { textLength, unreachable } from "./util";

// Fragments still to resolve, left to right, each with the indentation in
// effect where it was introduced. Union branches share the same tail.
export type Worklist = WorklistEntry | null;

export interface WorklistEntry {
  readonly indent: number;
  readonly doc: DocCore;
  readonly next: Worklist;
}

export function worklist(
  indent: number,
  doc: DocCore,
  next: Worklist,
): Worklist {
  return { indent, doc, next };
}

/**
 * Whether the worklist, resolved from the current column, reaches its first
 * line break (or its end) without using more than `remainingWidth` columns.
 *
 * A union met on the way is resolved to its broken branch. Its flat branch
 * never ends the line earlier, so the broken branch fits whenever either one
 * does.
 */
export function fits(remainingWidth: number, list: Worklist): boolean {
  let remaining = remainingWidth;
  let rest = list;
  while (remaining >= 0) {
    if (!rest) {
      return true;
    }
    const { indent, doc, next } = rest;
    switch (doc.kind) {
      case DocCoreKind.Nil:
        rest = next;
        break;
      case DocCoreKind.Append:
        rest = worklist(indent, doc.left, worklist(indent, doc.right, next));
        break;
      case DocCoreKind.Nest:
        rest = worklist(indent + doc.amount, doc.content, next);
        break;
      case DocCoreKind.Text:
        remaining -= textLength(doc.text);
        rest = next;
        break;
      case DocCoreKind.Line:
        return true;
      case DocCoreKind.Union:
        rest = worklist(indent, doc.broken, next);
        break;
      default:
        return unreachable(doc);
    }
  }
  return false;
}

export function better(
  width: number,
  column: number,
  x: Worklist,
  y: Worklist,
): Worklist {
  return fits(width - column, x) ? x : y;
}

type Emitted = { text: string } | { indent: number };

export function be(width: number, startColumn: number, list: Worklist): Doc {
  const emitted: Emitted[] = [];
  let column = startColumn;
  let rest = list;
  while (rest) {
    const { indent, doc, next } = rest;
    switch (doc.kind) {
      case DocCoreKind.Nil:
        rest = next;
        break;
      case DocCoreKind.Append:
        rest = worklist(indent, doc.left, worklist(indent, doc.right, next));
        break;
      case DocCoreKind.Nest:
        rest = worklist(indent + doc.amount, doc.content, next);
        break;
      case DocCoreKind.Text:
        emitted.push({ text: doc.text });
        column += textLength(doc.text);
        rest = next;
        break;
      case DocCoreKind.Line: {
        // negative nest amounts can take the indentation below the margin
        const lineIndent = Math.max(0, indent);
        emitted.push({ indent: lineIndent });
        column = lineIndent;
        rest = next;
        break;
      }
      case DocCoreKind.Union:
        // group of an already flat document
        if (doc.flat === doc.broken) {
          rest = worklist(indent, doc.flat, next);
          break;
        }
        rest = better(
          width,
          column,
          worklist(indent, doc.flat, next),
          worklist(indent, doc.broken, next),
        );
        break;
      default:
        return unreachable(doc);
    }
  }
  return R.reduceRight(
    (e: Emitted, acc: Doc) =>
      "text" in e ? textDoc(e.text, acc) : lineDoc(e.indent, acc),
    nilDoc(),
    emitted,
  );
}

export function best(width: number, column: number, doc: DocCore): Doc {
  return be(width, column, worklist(0, doc, null));
}
