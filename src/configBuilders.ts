import { AutovalidateMode, FieldConfig, FormChange, FormConfig } from "src/config";
import { FocusHandle } from "src/focusHandle";
import { Rule, required } from "src/rules";

/**
 * Provides a Zod-ish API for building field and form configs.
 */
export const f = {
  /** Creates the config DSL for a named field, like an age or first name. */
  field<V>(name: string): FieldConfigBuilder<V, V> {
    return new FieldConfigBuilder<V, V>({ name });
  },

  /** Creates the config DSL for the form that fields register with. */
  form(): FormConfigBuilder {
    return new FormConfigBuilder();
  },
};

/** Provides a fluent DSL for building up a field's config. */
export class FieldConfigBuilder<V, O> {
  constructor(private config: FieldConfig<V, O>) {}

  /** Sets the field's own default, which wins over the form's `initialValue`. */
  initial(value: V): this {
    this.config.initialValue = value;
    return this;
  }

  /** Marks the field as required, ahead of any other rules. */
  req(): this {
    this.config.rules = [required, ...(this.config.rules ?? []).filter((r) => r !== required)];
    return this;
  }

  /** Appends `rule` to the field's validation rules. */
  rule(rule: Rule<V | undefined>): this {
    (this.config.rules ??= []).push(rule);
    return this;
  }

  /** Appends `rules` to the field's validation rules. */
  rules(rules: Rule<V | undefined>[]): this {
    (this.config.rules ??= []).push(...rules);
    return this;
  }

  /** Sets what the form collects for this field on save, i.e. parsing text into a number. */
  transform<O2>(transform: (value: V | undefined) => O2): FieldConfigBuilder<V, O2> {
    // Copy rules so adding one to either builder doesn't change the other
    const rules = this.config.rules && [...this.config.rules];
    return new FieldConfigBuilder<V, O2>({ ...this.config, rules, transform });
  }

  /** Marks the field as initially disabled. */
  disabled(): this {
    this.config.enabled = false;
    return this;
  }

  autovalidate(mode: AutovalidateMode): this {
    this.config.autovalidateMode = mode;
    return this;
  }

  /** Overrides the form's policy on leaving this field out of its value while disabled. */
  skipDisabled(skip = true): this {
    this.config.skipDisabled = skip;
    return this;
  }

  /** Has the field borrow `handle` instead of creating its own. */
  focusHandle(handle: FocusHandle): this {
    this.config.focusHandle = handle;
    return this;
  }

  decorationError(message: string): this {
    this.config.decorationError = message;
    return this;
  }

  onChanged(fn: (value: V | undefined) => void): this {
    this.config.onChanged = fn;
    return this;
  }

  onReset(fn: () => void): this {
    this.config.onReset = fn;
    return this;
  }

  onSaved(fn: (value: V | undefined) => void): this {
    this.config.onSaved = fn;
    return this;
  }

  build(): FieldConfig<V, O> {
    return this.config;
  }
}

/** Provides a fluent DSL for building up a form's config. */
export class FormConfigBuilder {
  private config: FormConfig = {};

  /** Merges `value` into the defaults for fields without their own initial value. */
  initial(value: Record<string, unknown>): this {
    this.config.initialValue = { ...this.config.initialValue, ...value };
    return this;
  }

  disabled(): this {
    this.config.enabled = false;
    return this;
  }

  skipDisabled(skip = true): this {
    this.config.skipDisabled = skip;
    return this;
  }

  clearValueOnUnregister(clear = true): this {
    this.config.clearValueOnUnregister = clear;
    return this;
  }

  autovalidate(mode: AutovalidateMode): this {
    this.config.autovalidateMode = mode;
    return this;
  }

  onChanged(fn: (change: FormChange) => void): this {
    this.config.onChanged = fn;
    return this;
  }

  build(): FormConfig {
    return this.config;
  }
}
