import { bracket } from "../logic/combinators";
import { concat, DocCore, line, nest, nil, text } from "../logic/doc";
import { group } from "../logic/flatten";
import { textLength } from "../logic/util";
import { Tree } from "./interfaces";

export function tree(name: string, children: Tree[] = []): Tree {
  return { name, children };
}

// Children line up one column after the opening bracket:
//
// aaa[bbbbb[ccc,
//           dd],
//     eee]
export function showTree(t: Tree): DocCore {
  return group(
    concat(text(t.name), nest(textLength(t.name), showBracket(t.children))),
  );
}

function showBracket(children: Tree[]): DocCore {
  if (!children.length) {
    return nil();
  }
  return concat(text("["), nest(1, showTrees(children, showTree)), text("]"));
}

function showTrees(trees: Tree[], show: (t: Tree) => DocCore): DocCore {
  const [first, ...rest] = trees;
  if (!rest.length) {
    return show(first);
  }
  return concat(show(first), text(","), line(), showTrees(rest, show));
}

// Children are indented by 2 below the name:
//
// aaa[
//   bbbbb[ ccc, dd ],
//   eee
// ]
export function showTreeBracketed(t: Tree): DocCore {
  if (!t.children.length) {
    return text(t.name);
  }
  return concat(
    text(t.name),
    bracket("[", showTrees(t.children, showTreeBracketed), "]"),
  );
}
