import { action } from "mobx";
import { FormState } from "src/formState";

/** What a rule gets to know about the field it is validating, besides its value. */
export interface RuleContext<V> {
  name: string;
  initialValue: V;
  /** The form the field is registered with, for cross-field rules; undefined for standalone fields. */
  form: FormState | undefined;
}

/** A validation rule, given the value and its context, return the error string if invalid, or undefined if valid. */
export type Rule<V> = (value: V, context: RuleContext<V>) => string | undefined;

/** A rule that validates `value` is not `undefined`, `null`, or empty string. */
// We pre-emptively make this a mobx action so that it's identity doesn't change when proxied
// and breaks our ability to do `rules.some(r => r === required)`.
export const required = action(<V>(value: V): string | undefined => {
  const isEmptyString = typeof value === "string" ? value.trim() === "" : false;
  return value !== undefined && value !== null && !isEmptyString ? undefined : "Required";
});
