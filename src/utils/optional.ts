/**
 * Present/absent value holder for configuration elements.
 */

export type Optional<T> = { readonly present: true; readonly value: T } | { readonly present: false };

export const ABSENT: Optional<never> = Object.freeze({ present: false });

export function present<T>(value: T): Optional<T> {
  return { present: true, value };
}
