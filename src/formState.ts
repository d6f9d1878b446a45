import { makeAutoObservable, observable } from "mobx";
import { AutovalidateMode, FormChange, FormConfig, SetValueOpts, ValidateOpts } from "src/config";

/**
 * The view of a field that its form works with.
 *
 * Fields are generic on their value type, but a form holds many different fields, so it only
 * sees their values as `unknown`.
 */
export interface RegisteredField {
  readonly name: string;
  readonly value: unknown;
  readonly transformedValue: unknown;
  readonly enabled: boolean;
  readonly skipDisabled: boolean;
  readonly touched: boolean;
  readonly dirty: boolean;
  readonly errorText: string | undefined;
  readonly hasError: boolean;
  readonly isValid: boolean;
  setValue(value: unknown, opts?: SetValueOpts): void;
  didChange(value: unknown): void;
  validate(opts?: ValidateOpts): boolean;
  /** Re-runs the rules without touching any custom error. */
  revalidate(): void;
  reset(): void;
  save(): unknown;
  /** Pushes the field's current value into (or, if skipped while disabled, out of) the form's `instantValue`. */
  syncToForm(isSetState: boolean): void;
}

/**
 * A registry of named fields that aggregates them into a single value/validity snapshot.
 *
 * The form only holds references to its fields; each field owns its own value and lifecycle,
 * registering itself on creation and unregistering on `dispose()`.
 */
export interface FormState {
  /** Defaults for fields that don't declare their own initial value. */
  readonly initialValue: Readonly<Record<string, unknown>>;
  readonly enabled: boolean;
  readonly skipDisabled: boolean;
  readonly clearValueOnUnregister: boolean;
  autovalidateMode: AutovalidateMode;
  /** The registered fields, in registration order. */
  readonly fields: ReadonlyMap<string, RegisteredField>;
  /** The latest untransformed value pushed by each field. */
  readonly instantValue: Record<string, unknown>;
  /** The transformed values collected by the last `save()`. */
  readonly value: Record<string, unknown>;
  /** The error text of each field that currently has one. */
  readonly errors: Record<string, string>;
  readonly isValid: boolean;
  readonly isDirty: boolean;
  readonly isTouched: boolean;
  getField(name: string): RegisteredField | undefined;
  registerField(name: string, field: RegisteredField): void;
  /** Removes `field`, unless a different field has since been registered under `name`. */
  unregisterField(name: string, field: RegisteredField): void;
  setInternalFieldValue(name: string, value: unknown, isSetState: boolean): void;
  removeInternalFieldValue(name: string, isSetState: boolean): void;
  /** Called by fields after a user-driven change. */
  fieldDidChange(): void;
  /** Validates every field, without stopping at the first invalid one. */
  validate(): boolean;
  save(): Record<string, unknown>;
  saveAndValidate(): boolean;
  reset(): void;
  /** Pushes values into the currently-registered fields; names without a field are ignored. */
  patchValue(patch: Record<string, unknown>): void;
  /** Merges into `initialValue`, which only fields registered afterwards will see. */
  patchInitialValue(patch: Record<string, unknown>): void;
  setEnabled(enabled: boolean): void;
}

class FormStateImpl implements FormState {
  initialValue: Record<string, unknown>;
  enabled: boolean;
  readonly skipDisabled: boolean;
  readonly clearValueOnUnregister: boolean;
  autovalidateMode: AutovalidateMode;
  value: Record<string, unknown> = {};
  readonly fields = observable.map<string, RegisteredField>({}, { deep: false });
  readonly _instantValue = observable.map<string, unknown>({}, { deep: false });
  readonly _onChanged: ((change: FormChange) => void) | undefined;

  constructor(config: FormConfig) {
    this.initialValue = { ...config.initialValue };
    this.enabled = config.enabled ?? true;
    this.skipDisabled = config.skipDisabled ?? false;
    this.clearValueOnUnregister = config.clearValueOnUnregister ?? false;
    this.autovalidateMode = config.autovalidateMode ?? "disabled";
    this._onChanged = config.onChanged;
    makeAutoObservable(
      this,
      {
        initialValue: observable.ref,
        value: observable.ref,
        fields: false,
        _instantValue: false,
        _onChanged: false,
      },
      { autoBind: true },
    );
  }

  get instantValue(): Record<string, unknown> {
    return Object.fromEntries(this._instantValue);
  }

  get errors(): Record<string, string> {
    const errors: Record<string, string> = {};
    this.fields.forEach((field, name) => {
      if (field.errorText !== undefined) errors[name] = field.errorText;
    });
    return errors;
  }

  get isValid(): boolean {
    return [...this.fields.values()].every((f) => f.isValid);
  }

  get isDirty(): boolean {
    return [...this.fields.values()].some((f) => f.dirty);
  }

  get isTouched(): boolean {
    return [...this.fields.values()].some((f) => f.touched);
  }

  getField(name: string): RegisteredField | undefined {
    return this.fields.get(name);
  }

  registerField(name: string, field: RegisteredField): void {
    const existing = this.fields.get(name);
    if (existing && existing !== field) {
      console.warn(`Replacing the field registered as "${name}", its state is discarded`);
    }
    this.fields.set(name, field);
    if (!existing && !this.clearValueOnUnregister && this._instantValue.has(name)) {
      // Pick up the value an earlier field under this name left behind
      field.setValue(this._instantValue.get(name), { notifyForm: false });
    }
    field.syncToForm(false);
  }

  unregisterField(name: string, field: RegisteredField): void {
    if (this.fields.get(name) !== field) {
      console.debug(`Ignoring unregister of "${name}", it was already replaced or removed`);
      return;
    }
    this.fields.delete(name);
    if (this.clearValueOnUnregister) {
      this._instantValue.delete(name);
      if (name in this.value) {
        this.value = Object.fromEntries(Object.entries(this.value).filter(([key]) => key !== name));
      }
    }
  }

  setInternalFieldValue(name: string, value: unknown, isSetState: boolean): void {
    this._instantValue.set(name, value);
    this._onChanged?.({ name, value, removed: false, isSetState });
    if (this.autovalidateMode === "always") this.revalidateAll();
  }

  removeInternalFieldValue(name: string, isSetState: boolean): void {
    if (!this._instantValue.has(name)) return;
    this._instantValue.delete(name);
    this._onChanged?.({ name, value: undefined, removed: true, isSetState });
  }

  fieldDidChange(): void {
    if (this.autovalidateMode !== "disabled") this.revalidateAll();
  }

  validate(): boolean {
    let valid = true;
    // Don't short-circuit, every field should show its error
    this.fields.forEach((field) => {
      valid = field.validate() && valid;
    });
    return valid;
  }

  save(): Record<string, unknown> {
    const value: Record<string, unknown> = {};
    this.fields.forEach((field, name) => {
      const transformed = field.save();
      if (!isSkipped(field)) value[name] = transformed;
    });
    this.value = value;
    return value;
  }

  saveAndValidate(): boolean {
    this.save();
    return this.validate();
  }

  reset(): void {
    this.fields.forEach((field) => field.reset());
  }

  patchValue(patch: Record<string, unknown>): void {
    Object.entries(patch).forEach(([name, value]) => this.fields.get(name)?.didChange(value));
  }

  patchInitialValue(patch: Record<string, unknown>): void {
    this.initialValue = { ...this.initialValue, ...patch };
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    this.fields.forEach((field) => field.syncToForm(true));
  }

  private revalidateAll(): void {
    this.fields.forEach((field) => {
      if (field.enabled) field.revalidate();
    });
  }
}

function isSkipped(field: RegisteredField): boolean {
  return !field.enabled && field.skipDisabled;
}

/** Creates a new, empty `FormState` for fields to register with. */
export function createFormState(config: FormConfig = {}): FormState {
  return new FormStateImpl(config);
}
