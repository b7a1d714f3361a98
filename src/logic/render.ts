import * as R from "ramda";
import { best } from "./best";
import { DocCore } from "./doc";
import { Doc, DocKind } from "./resolved";
import { unreachable } from "./util";

// Indentation left of the margin is rendered as none.
export function indentation(indent: number): string {
  return R.repeat(" ", Math.max(0, indent)).join("");
}

export function layout(doc: Doc): string {
  const output: string[] = [];
  let current = doc;
  while (current.kind !== DocKind.Nil) {
    switch (current.kind) {
      case DocKind.Text:
        output.push(current.text);
        break;
      case DocKind.Line:
        output.push("\n", indentation(current.indent));
        break;
      default:
        return unreachable(current);
    }
    current = current.rest;
  }
  return output.join("");
}

export function pretty(width: number, doc: DocCore): string {
  return layout(best(width, 0, doc));
}
