export type { DocCore } from "./logic/doc";
export { append, concat, line, nest, nil, text } from "./logic/doc";
export { flatten, group } from "./logic/flatten";
export {
  bracket,
  fill,
  fillWords,
  foldDoc,
  newline,
  space,
  spaceNewline,
  spread,
  stack,
} from "./logic/combinators";
export type { DocJoiner } from "./logic/combinators";
export { pretty } from "./logic/render";
export {
  defaultPrettyOptions,
  prettyWithOptions,
  resolvePrettyOptions,
} from "./logic/options";
export type { PrettyOptions } from "./logic/options";
