import { Observer } from "mobx-react";
import { useState } from "react";
import { f, FieldConfig, FieldState, FormState, useFieldState, useFormState } from "src/index";

export function FormApp() {
  const [enabled, setEnabled] = useState(true);
  const [showNickname, setShowNickname] = useState(true);
  const [saved, setSaved] = useState<Record<string, unknown>>({});
  const form = useFormState({ ...formConfig, enabled });

  return (
    <div className="App">
      <TextField form={form} config={firstNameConfig} />
      <AgeField form={form} />
      {showNickname && <TextField form={form} config={nicknameConfig} />}

      <FormSummary form={form} saved={saved} />

      <div>
        <button data-testid="save" onClick={() => form.saveAndValidate() && setSaved(form.value)}>
          save
        </button>
        <button data-testid="reset" onClick={() => form.reset()}>
          reset
        </button>
        <button data-testid="toggleEnabled" onClick={() => setEnabled(!enabled)}>
          toggle enabled
        </button>
        <button data-testid="toggleNickname" onClick={() => setShowNickname(!showNickname)}>
          toggle nickname
        </button>
      </div>
    </div>
  );
}

function FormSummary(props: { form: FormState; saved: Record<string, unknown> }) {
  const { form, saved } = props;
  return (
    <Observer>
      {() => (
        <div>
          <strong>Form</strong>
          <table cellPadding="4px">
            <thead>
              <tr>
                <th>fields</th>
                <th>touched</th>
                <th>valid</th>
                <th>dirty</th>
                <th>instant value</th>
                <th>saved value</th>
              </tr>
            </thead>
            <tbody>
              <tr>
                <td data-testid="form_fields">{[...form.fields.keys()].join(",")}</td>
                <td data-testid="form_touched">{form.isTouched.toString()}</td>
                <td data-testid="form_valid">{form.isValid.toString()}</td>
                <td data-testid="form_dirty">{form.isDirty.toString()}</td>
                <td data-testid="form_instant">{JSON.stringify(form.instantValue)}</td>
                <td data-testid="form_saved">{JSON.stringify(saved)}</td>
              </tr>
            </tbody>
          </table>
        </div>
      )}
    </Observer>
  );
}

// Simulate getting the form's initial values back from a server call
const formConfig = f.form().initial({ firstName: "a1" }).skipDisabled().build();

const firstNameConfig = f.field<string>("firstName").req().build();

const nicknameConfig = f.field<string>("nickname").initial("nick").build();

const ageConfig = f
  .field<string>("age")
  .initial("18")
  .rule((value) => (value !== undefined && isNaN(Number(value)) ? "Must be a number" : undefined))
  .transform((text) => (text === undefined || text === "" ? undefined : Number(text)))
  .build();

function AgeField(props: { form: FormState }) {
  const field = useFieldState(props.form, ageConfig);
  return (
    <div>
      <FieldInput field={field} />
      <button data-testid="age_invalidate" onClick={() => field.invalidate("Too young")}>
        invalidate
      </button>
    </div>
  );
}

export function TextField(props: { form: FormState; config: FieldConfig<string> }) {
  const field = useFieldState(props.form, props.config);
  return <FieldInput field={field} />;
}

export function FieldInput(props: { field: FieldState<string, unknown> }) {
  const { field } = props;
  // Re-render on field changes, which never change our props
  return (
    <Observer>
      {() => (
        <div>
          <span>{field.name}:</span>
          <div>
            <input
              data-testid={field.name}
              value={field.value ?? ""}
              disabled={!field.enabled}
              onFocus={() => field.focusHandle.requestFocus()}
              onBlur={() => field.focusHandle.unfocus()}
              onChange={(e) => field.didChange(e.target.value)}
            />
          </div>
          <table cellPadding="4px">
            <thead>
              <tr>
                <th>touched</th>
                <th>valid</th>
                <th>dirty</th>
                <th>focused</th>
                <th>error</th>
              </tr>
            </thead>
            <tbody>
              <tr>
                <td data-testid={`${field.name}_touched`}>{field.touched.toString()}</td>
                <td data-testid={`${field.name}_valid`}>{field.isValid.toString()}</td>
                <td data-testid={`${field.name}_dirty`}>{field.dirty.toString()}</td>
                <td data-testid={`${field.name}_focused`}>{field.focusHandle.hasFocus.toString()}</td>
                <td data-testid={`${field.name}_error`}>{field.effectiveError}</td>
              </tr>
            </tbody>
          </table>
        </div>
      )}
    </Observer>
  );
}
