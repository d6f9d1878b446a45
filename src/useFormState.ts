import { useEffect, useMemo, useRef, useState } from "react";
import { FieldConfig, FormConfig } from "src/config";
import { FieldState, newFieldState } from "src/fields/fieldState";
import { FormState, createFormState } from "src/formState";

export type UseFormStateOpts = FormConfig;

/**
 * Creates a form for fields to register with, stable across renders.
 *
 * Only `enabled` is kept in sync after the first render; `onChanged` does not need to be
 * stable/useMemo'd. The rest of the config is read once.
 */
export function useFormState(opts: UseFormStateOpts = {}): FormState {
  const { enabled = true } = opts;

  // Use a ref so our memo'ized form always calls the latest listener
  const onChangedRef = useRef<FormConfig["onChanged"]>(opts.onChanged);
  onChangedRef.current = opts.onChanged;

  const form = useMemo(
    () => createFormState({ ...opts, onChanged: (change) => onChangedRef.current?.(change) }),
    // The form identity must survive re-renders, otherwise every field would re-register
    // eslint-disable-next-line react-hooks/exhaustive-deps
    [],
  );

  // Use useEffect so that the fields re-pushing their values doesn't happen during our render
  useEffect(() => {
    if (form.enabled !== enabled) form.setEnabled(enabled);
  }, [form, enabled]);

  return form;
}

/**
 * Creates a field registered with `form` when the calling component mounts, and disposes it
 * (which unregisters it) when the component unmounts.
 *
 * `form` is read once. `enabled` and `focusHandle` are kept in sync with the latest config; the
 * callbacks do not need to be stable/useMemo'd.
 */
export function useFieldState<V, O = V>(form: FormState | undefined, config: FieldConfig<V, O>): FieldState<V, O> {
  const { enabled = true, focusHandle } = config;

  // Use a ref so the field's callbacks always see the latest ones we were rendered with
  const configRef = useRef(config);
  configRef.current = config;

  // Registration waits for our effect, so that the form's observers aren't updated during our render
  const newField = () =>
    newFieldState<V, O>(
      {
        ...configRef.current,
        onChanged: (value) => configRef.current.onChanged?.(value),
        onReset: () => configRef.current.onReset?.(),
        onSaved: (value) => configRef.current.onSaved?.(value),
      },
      form,
      { register: false },
    );
  const [field, setField] = useState(newField);

  useEffect(() => {
    // StrictMode re-runs this effect after its cleanup has already disposed our first field
    let current = field;
    if (current.disposed) {
      current = newField();
      setField(current);
    }
    current.register();
    return () => current.dispose();
    // Only on mount/unmount, a new field from ^ must not re-trigger us
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, []);

  useEffect(() => {
    field.setEnabled(enabled);
  }, [field, enabled]);

  useEffect(() => {
    field.setFocusHandle(focusHandle);
  }, [field, focusHandle]);

  return field;
}
