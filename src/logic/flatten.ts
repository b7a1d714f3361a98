import { append, DocCore, DocCoreKind, nest, text, union } from "./doc";
import { memoize } from "./memoize";
import { unreachable } from "./util";

function flattenUncached(doc: DocCore): DocCore {
  switch (doc.kind) {
    case DocCoreKind.Nil:
    case DocCoreKind.Text:
      return doc;
    case DocCoreKind.Append: {
      const left = flatten(doc.left);
      const right = flatten(doc.right);
      if (left === doc.left && right === doc.right) {
        return doc;
      }
      return append(left, right);
    }
    case DocCoreKind.Nest: {
      const content = flatten(doc.content);
      if (content === doc.content) {
        return doc;
      }
      return nest(doc.amount, content);
    }
    case DocCoreKind.Line:
      return text(" ");
    case DocCoreKind.Union:
      return flatten(doc.flat);
    default:
      return unreachable(doc);
  }
}

/**
 * Collapse every line break into a single space, taking the flat branch of
 * every union. Unchanged subtrees are returned as-is, so flattening an
 * already flat document returns the same value.
 */
export const flatten: (doc: DocCore) => DocCore = memoize(flattenUncached);

/**
 * Render `content` on one line if it fits, otherwise with its own line
 * breaks (which may themselves belong to nested groups).
 */
export function group(content: DocCore): DocCore {
  return union(flatten(content), content);
}
