import { UnknownFormatError } from "./errors";

export const NAMED_FORMATS = ["short", "rps", "human", "full"] as const;
export const METHOD_FORMATS = ["elapsed", "hms"] as const;

export type NamedFormat = (typeof NAMED_FORMATS)[number];
export type MethodFormat = (typeof METHOD_FORMATS)[number];

/** Caller-supplied renderer; receives the timer being formatted. */
export type CustomFormat<T> = (timer: T) => string | number;

export type StringFormatOption<T> = NamedFormat | MethodFormat | CustomFormat<T>;

export type ResolvedFormat<T> =
  | { kind: "custom"; render: CustomFormat<T> }
  | { kind: "method"; method: MethodFormat }
  | { kind: NamedFormat };

function includes<V extends string>(values: readonly V[], candidate: string): candidate is V {
  const known: readonly string[] = values;
  return known.includes(candidate);
}

/** Callables and method names take precedence over the named variants. */
export function resolveStringFormat<T>(format: StringFormatOption<T> | string): ResolvedFormat<T> {
  if (typeof format === "function") {
    return { kind: "custom", render: format };
  }
  if (includes(METHOD_FORMATS, format)) {
    return { kind: "method", method: format };
  }
  if (includes(NAMED_FORMATS, format)) {
    return { kind: format };
  }
  throw new UnknownFormatError(format);
}

export function isStringFormatName(name: string): name is NamedFormat | MethodFormat {
  return includes(NAMED_FORMATS, name) || includes(METHOD_FORMATS, name);
}
