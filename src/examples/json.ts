import { bracket, foldDoc } from "../logic/combinators";
import { concat, DocCore, line, text } from "../logic/doc";
import { JsonValue } from "./interfaces";

function commaLine(x: DocCore, y: DocCore): DocCore {
  return concat(x, text(","), line(), y);
}

export function showJson(value: JsonValue): DocCore {
  if (Array.isArray(value)) {
    if (!value.length) {
      return text("[]");
    }
    return bracket("[", foldDoc(commaLine, value.map(showJson)), "]");
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value);
    if (!entries.length) {
      return text("{}");
    }
    return bracket(
      "{",
      foldDoc(
        commaLine,
        entries.map(([k, v]) =>
          concat(text(JSON.stringify(k)), text(": "), showJson(v)),
        ),
      ),
      "}",
    );
  }
  return text(JSON.stringify(value));
}
