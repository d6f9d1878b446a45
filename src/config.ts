import { FocusHandle } from "src/focusHandle";
import { Rule } from "src/rules";

/**
 * When a field re-runs its rules on its own, i.e. without an explicit `validate()` call.
 *
 * - `disabled` only validates on explicit calls, i.e. on submit
 * - `always` validates after every value change
 * - `onUserInteraction` validates after value changes once the user has edited the field
 */
export type AutovalidateMode = "disabled" | "always" | "onUserInteraction";

/**
 * Config for a single named field.
 *
 * `V` is the type the field edits (i.e. the text in a text box), and `O` is the type the field
 * contributes to the form's saved value after `transform` (i.e. that text parsed into a number).
 */
export type FieldConfig<V, O = V> = {
  name: string;
  /** The field's default; when unset, falls back to the form's `initialValue[name]`. */
  initialValue?: V;
  /** Ordered rules, the first error wins. */
  rules?: Rule<V | undefined>[];
  /** Maps the value into what the form collects on `save()`; never changes the field's own value. */
  transform?: (value: V | undefined) => O;
  /** Defaults to true; the form's `enabled` flag is and-d on top. */
  enabled?: boolean;
  /** Overrides the form's `skipDisabled` policy for this field. */
  skipDisabled?: boolean;
  /** Defaults to `onUserInteraction`. */
  autovalidateMode?: AutovalidateMode;
  /** A handle the field borrows; when unset the field creates (and owns) its own. */
  focusHandle?: FocusHandle;
  /** A static error supplied by the display layer, i.e. an input decoration. */
  decorationError?: string;
  /** Called after a user-driven change. */
  onChanged?: (value: V | undefined) => void;
  onReset?: () => void;
  /** Called with the untransformed value when the form saves. */
  onSaved?: (value: V | undefined) => void;
};

/** Config for the form that fields register with. */
export type FormConfig = {
  /** Defaults for fields that don't declare their own `initialValue`. */
  initialValue?: Record<string, unknown>;
  enabled?: boolean;
  /** Whether disabled fields are left out of `instantValue` and the saved value; defaults to false. */
  skipDisabled?: boolean;
  /**
   * Whether an unregistered field's value is dropped from `instantValue`; defaults to false.
   *
   * When false, a field registering later under the same name picks the left-behind value back up.
   */
  clearValueOnUnregister?: boolean;
  /** Form-wide autovalidation, on top of each field's own mode; defaults to `disabled`. */
  autovalidateMode?: AutovalidateMode;
  /** Called whenever a field pushes a value into, or removes one from, `instantValue`. */
  onChanged?: (change: FormChange) => void;
};

/** Describes a single update to the form's `instantValue`. */
export type FormChange = {
  name: string;
  /** The pushed (untransformed) value, or undefined when `removed`. */
  value: unknown;
  removed: boolean;
  /**
   * Whether the change came from something other than the user typing into the field, i.e. the form
   * being disabled, so the display layer should schedule a refresh itself.
   */
  isSetState: boolean;
};

export interface NewFieldStateOpts {
  /** Whether to call `register()` right away; defaults to true. */
  register?: boolean;
}

export interface SetValueOpts {
  /** Whether to push the new value into the form's `instantValue`; defaults to true. */
  notifyForm?: boolean;
}

export interface ValidateOpts {
  /** Whether to drop an error set by `invalidate` before running the rules; defaults to true. */
  clearCustomError?: boolean;
}
