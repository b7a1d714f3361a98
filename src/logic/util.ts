export function unreachable(v: never): never {
  console.error(v);
  throw new Error("unreachable");
}

// Number of characters (code points) the text occupies on a line.
export function textLength(text: string): number {
  return Array.from(text).length;
}
