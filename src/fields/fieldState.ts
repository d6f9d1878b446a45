import { IReactionDisposer, makeAutoObservable, observable, reaction } from "mobx";
import { AutovalidateMode, FieldConfig, NewFieldStateOpts, SetValueOpts, ValidateOpts } from "src/config";
import { FocusHandle, newFocusHandle } from "src/focusHandle";
import { FormState, RegisteredField } from "src/formState";
import { Rule, RuleContext, required } from "src/rules";
import { areEqual, fail } from "src/utils";

/**
 * Form state for a single named field, i.e. its value but also touched/validation/focus state.
 *
 * The field registers itself with `form` (if any) on `register()`, which by default happens when it is
 * created, pushes every value change into the form's `instantValue`, and unregisters on `dispose()`. The form only pushes values back down on
 * `reset()` and `patchValue()`.
 *
 * `V` is the value being edited, and `O` is what `transform` turns it into when the form saves.
 */
export interface FieldState<V, O = V> extends RegisteredField {
  readonly name: string;
  readonly value: V | undefined;
  /** Resolved once on creation: the field's own default, or else the form's `initialValue[name]`. */
  readonly initialValue: V | undefined;
  /** The value after `transform`, which is what the form collects on `save()`. */
  readonly transformedValue: O | V | undefined;
  readonly form: FormState | undefined;
  /** Set the first time the field gains focus. */
  readonly touched: boolean;
  /** Whether `didChange` has been called since creation or the last `reset()`. */
  readonly hasInteractedByUser: boolean;
  /** Our own flag and-d with the form's. */
  readonly enabled: boolean;
  readonly dirty: boolean;
  readonly required: boolean;
  rules: Rule<V | undefined>[];
  autovalidateMode: AutovalidateMode;
  /** An error set by `invalidate`, independent of the rules. */
  readonly customError: string | undefined;
  /** A static error supplied by the display layer. */
  decorationError: string | undefined;
  /** The recorded rule error, or else the custom error. */
  readonly errorText: string | undefined;
  /** What the display layer shows: our own error, or else the decoration's. */
  readonly effectiveError: string | undefined;
  readonly hasError: boolean;
  /** Whether the rules currently pass, and there is neither a custom nor a decoration error. */
  readonly isValid: boolean;
  readonly focusHandle: FocusHandle;
  /** Whether we created `focusHandle` ourselves, and so are the ones to dispose it. */
  readonly ownsFocusHandle: boolean;
  readonly disposed: boolean;
  /**
   * Starts tracking focus and registers with `form`, pushing our value into its `instantValue`.
   *
   * Fields created with `register: false` wait for this call, i.e. until their component has mounted.
   * Calling it again is a no-op; calling it after `dispose()` throws.
   */
  register(): void;
  /** Sets the value programmatically, without counting as a user interaction. */
  setValue(value: V | undefined, opts?: SetValueOpts): void;
  /** Sets the value on behalf of the user, i.e. from an input's change event. */
  didChange(value: V | undefined): void;
  /** Marks the field touched the first time it gains focus. */
  onFocusChange(hasFocus: boolean): void;
  /** Runs the rules in order, records the first error, and returns whether the field has no error at all. */
  validate(opts?: ValidateOpts): boolean;
  /** Surfaces an external (i.e. server-side) error on this field and moves focus to it, unless disposed. */
  invalidate(message: string): void;
  /** Restores the initial value and clears errors, touched, and interaction state. */
  reset(): void;
  /** Calls `onSaved` and returns the transformed value. */
  save(): O | V | undefined;
  /** Moves focus to the field; a no-op once disposed, b/c the handle is no longer ours to use. */
  requestFocus(): void;
  /** Sets our own enabled flag, re-pushing our value so the form can apply `skipDisabled`. */
  setEnabled(enabled: boolean): void;
  /** Swaps the focus resource, i.e. borrowing `handle`, or owning a new one when undefined; ignored once disposed. */
  setFocusHandle(handle: FocusHandle | undefined): void;
  /** Unregisters from the form and releases the focus handle if we own it. */
  dispose(): void;
}

class FieldStateImpl<V, O> implements FieldState<V, O> {
  readonly name: string;
  readonly form: FormState | undefined;
  readonly initialValue: V | undefined;
  rules: Rule<V | undefined>[];
  autovalidateMode: AutovalidateMode;
  decorationError: string | undefined;
  touched = false;
  hasInteractedByUser = false;
  customError: string | undefined = undefined;
  disposed = false;
  _registered = false;
  _value: V | undefined;
  _ruleError: string | undefined = undefined;
  _enabled: boolean;
  _focusHandle: FocusHandle;
  _ownsFocusHandle: boolean;
  _stopWatchingFocus: IReactionDisposer | undefined = undefined;
  readonly _config: FieldConfig<V, O>;

  constructor(config: FieldConfig<V, O>, form: FormState | undefined, opts: NewFieldStateOpts) {
    this._config = config;
    this.name = config.name;
    this.form = form;
    this.initialValue = config.initialValue !== undefined ? config.initialValue : fromForm<V>(form, config.name);
    this.rules = config.rules ?? [];
    this.autovalidateMode = config.autovalidateMode ?? "onUserInteraction";
    this.decorationError = config.decorationError;
    this._value = this.initialValue;
    this._enabled = config.enabled ?? true;
    this._focusHandle = config.focusHandle ?? newFocusHandle(config.name);
    this._ownsFocusHandle = config.focusHandle === undefined;
    makeAutoObservable(
      this,
      {
        name: false,
        form: false,
        initialValue: false,
        // Keep rules as-is, otherwise mobx would wrap each one and break `rules.some(r => r === required)`
        rules: observable.shallow,
        _value: observable.ref,
        _focusHandle: observable.ref,
        _stopWatchingFocus: false,
        _config: false,
      },
      { autoBind: true },
    );
    if (opts.register ?? true) this.register();
    this.maybeAutovalidate();
  }

  get value(): V | undefined {
    return this._value;
  }

  get transformedValue(): O | V | undefined {
    const { transform } = this._config;
    return transform ? transform(this._value) : this._value;
  }

  get enabled(): boolean {
    return this._enabled && (this.form?.enabled ?? true);
  }

  get skipDisabled(): boolean {
    return this._config.skipDisabled ?? this.form?.skipDisabled ?? false;
  }

  get dirty(): boolean {
    return !areEqual(this.initialValue, this._value);
  }

  get required(): boolean {
    return this.rules.some((rule) => rule === required);
  }

  get errorText(): string | undefined {
    return this._ruleError ?? this.customError;
  }

  get effectiveError(): string | undefined {
    return this.errorText ?? this.decorationError;
  }

  get hasError(): boolean {
    return this.errorText !== undefined || this.decorationError !== undefined;
  }

  get isValid(): boolean {
    return this.runRules() === undefined && this.customError === undefined && this.decorationError === undefined;
  }

  get focusHandle(): FocusHandle {
    return this._focusHandle;
  }

  get ownsFocusHandle(): boolean {
    return this._ownsFocusHandle;
  }

  register(): void {
    if (this.disposed) fail(`Field ${this.name} was registered after being disposed`);
    if (this._registered) return;
    this._registered = true;
    this.watchFocus();
    this.form?.registerField(this.name, this);
  }

  setValue(value: V | undefined, opts: SetValueOpts = {}): void {
    this._value = value;
    if (opts.notifyForm ?? true) {
      this.syncToForm(false);
    }
    this.maybeAutovalidate();
  }

  didChange(value: V | undefined): void {
    this._value = value;
    this.hasInteractedByUser = true;
    this.syncToForm(false);
    this.maybeAutovalidate();
    this._config.onChanged?.(value);
    if (this.isRegistered()) this.form?.fieldDidChange();
  }

  onFocusChange(hasFocus: boolean): void {
    if (hasFocus && !this.touched) {
      this.touched = true;
    }
  }

  validate(opts: ValidateOpts = {}): boolean {
    if (opts.clearCustomError ?? true) {
      this.customError = undefined;
    }
    this.revalidate();
    return !this.hasError;
  }

  revalidate(): void {
    this._ruleError = this.runRules();
  }

  invalidate(message: string): void {
    this.customError = message;
    this.validate({ clearCustomError: false });
    this.requestFocus();
  }

  reset(): void {
    this._value = this.initialValue;
    this.customError = undefined;
    this._ruleError = undefined;
    this.touched = false;
    this.hasInteractedByUser = false;
    this.syncToForm(false);
    this._config.onReset?.();
  }

  save(): O | V | undefined {
    this._config.onSaved?.(this._value);
    return this.transformedValue;
  }

  requestFocus(): void {
    if (this.disposed) return;
    this._focusHandle.requestFocus();
  }

  setEnabled(enabled: boolean): void {
    if (enabled === this._enabled) return;
    this._enabled = enabled;
    this.syncToForm(true);
  }

  setFocusHandle(handle: FocusHandle | undefined): void {
    if (this.disposed) return;
    if (handle === undefined ? this._ownsFocusHandle : handle === this._focusHandle) return;
    this.releaseFocusHandle();
    this._focusHandle = handle ?? newFocusHandle(this.name);
    this._ownsFocusHandle = handle === undefined;
    // Unregistered fields start watching on `register()`
    if (this._registered) this.watchFocus();
  }

  syncToForm(isSetState: boolean): void {
    const { form } = this;
    // A field that was replaced under our name, or already disposed, no longer speaks for it
    if (!form || !this.isRegistered()) return;
    if (this.enabled || !this.skipDisabled) {
      form.setInternalFieldValue(this.name, this._value, isSetState);
    } else {
      form.removeInternalFieldValue(this.name, isSetState);
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.releaseFocusHandle();
    if (this._registered) this.form?.unregisterField(this.name, this);
    this.disposed = true;
  }

  private isRegistered(): boolean {
    return this.form?.getField(this.name) === this;
  }

  private maybeAutovalidate(): void {
    if (!this.enabled) return;
    const mode = this.autovalidateMode;
    if (mode === "always" || (mode === "onUserInteraction" && this.hasInteractedByUser)) {
      this.revalidate();
    }
  }

  private runRules(): string | undefined {
    const context: RuleContext<V | undefined> = { name: this.name, initialValue: this.initialValue, form: this.form };
    for (const rule of this.rules) {
      const error = rule(this._value, context);
      if (error !== undefined) return error;
    }
    return undefined;
  }

  private watchFocus(): void {
    this._stopWatchingFocus = reaction(() => this._focusHandle.hasFocus, this.onFocusChange);
  }

  private releaseFocusHandle(): void {
    this._stopWatchingFocus?.();
    this._stopWatchingFocus = undefined;
    // Borrowed handles are released by whoever lent them to us
    if (this._ownsFocusHandle && !this._focusHandle.disposed) {
      this._focusHandle.dispose();
    }
  }
}

// The form's initial values are untyped, so trust that the entry for our name matches `V`.
function fromForm<V>(form: FormState | undefined, name: string): V | undefined {
  return form?.initialValue[name] as V | undefined;
}

/**
 * Creates a new `FieldState`, registered with `form` if given.
 *
 * The caller that builds the form's tree passes `form` explicitly; a field without one works
 * standalone, i.e. its value is simply not aggregated anywhere.
 */
export function newFieldState<V, O = V>(
  config: FieldConfig<V, O>,
  form?: FormState,
  opts: NewFieldStateOpts = {},
): FieldState<V, O> {
  return new FieldStateImpl(config, form, opts);
}
