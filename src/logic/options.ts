import { DocCore } from "./doc";
import { pretty } from "./render";

export interface PrettyOptions {
  // Desired maximum line length in characters. Text fragments longer than
  // this still end up on a line of their own.
  width: number;
}

export const defaultPrettyOptions: PrettyOptions = {
  width: 80,
};

export function resolvePrettyOptions(
  options: Partial<PrettyOptions> = {},
): PrettyOptions {
  const resolved = { ...defaultPrettyOptions, ...options };
  if (!Number.isInteger(resolved.width)) {
    throw new Error(
      `width must be a finite integer (got ${String(resolved.width)})`,
    );
  }
  return resolved;
}

export function prettyWithOptions(
  doc: DocCore,
  options?: Partial<PrettyOptions>,
): string {
  return pretty(resolvePrettyOptions(options).width, doc);
}
