import {
  append,
  concat,
  DocCore,
  DocCoreKind,
  line,
  nest,
  nil,
  text,
  union,
} from "../doc";
import { flatten, group } from "../flatten";

describe("constructors", () => {
  test("nil and line are shared values", () => {
    expect(nil()).toBe(nil());
    expect(line()).toBe(line());
    expect(nil().kind).toBe(DocCoreKind.Nil);
    expect(line().kind).toBe(DocCoreKind.Line);
  });

  test("concat appends right associated", () => {
    const [a, b, c] = [text("a"), text("b"), text("c")];
    expect(concat()).toBe(nil());
    expect(concat(a)).toBe(a);
    expect(concat(a, b, c)).toEqual(append(a, append(b, c)));
  });

  test("group offers the flattened document first", () => {
    const doc = concat(text("a"), line(), text("b"));
    expect(group(doc)).toEqual(
      union(concat(text("a"), text(" "), text("b")), doc),
    );
  });

  test("group of a document without line breaks has identical branches", () => {
    const doc = concat(text("a"), nest(2, text("b")));
    const grouped = group(doc);
    expect(grouped).toEqual(union(doc, doc));
    if (grouped.kind !== DocCoreKind.Union) {
      throw new Error("expected union");
    }
    expect(grouped.flat).toBe(grouped.broken);
  });
});

describe("flatten", () => {
  interface TestCase {
    label: string;
    doc: DocCore;
    expected: DocCore;
  }
  const cases: TestCase[] = [
    { label: "nil", doc: nil(), expected: nil() },
    { label: "text", doc: text("abc"), expected: text("abc") },
    { label: "line", doc: line(), expected: text(" ") },
    {
      label: "append",
      doc: append(text("a"), line()),
      expected: append(text("a"), text(" ")),
    },
    {
      label: "nest keeps its amount",
      doc: nest(2, line()),
      expected: nest(2, text(" ")),
    },
    {
      label: "union takes the flat branch",
      doc: union(text("x"), line()),
      expected: text("x"),
    },
    {
      label: "nested groups",
      doc: group(concat(text("a"), group(concat(line(), text("b"))))),
      expected: concat(text("a"), text(" "), text("b")),
    },
  ];
  for (const c of cases) {
    test(c.label, () => {
      expect(flatten(c.doc)).toEqual(c.expected);
    });
  }

  const sample = group(
    concat(
      text("a"),
      nest(2, concat(line(), group(concat(text("b"), line(), text("c"))))),
    ),
  );

  test("returns documents without line breaks unchanged", () => {
    const doc = concat(text("a"), nest(2, text("b")));
    expect(flatten(doc)).toBe(doc);
  });

  test("is idempotent", () => {
    expect(flatten(flatten(sample))).toBe(flatten(sample));
  });

  test("is not changed by group", () => {
    expect(flatten(group(sample))).toEqual(flatten(sample));
  });

  test("caches results per document", () => {
    const doc = concat(text("a"), line(), text("b"));
    expect(flatten(doc)).toBe(flatten(doc));
  });
});
