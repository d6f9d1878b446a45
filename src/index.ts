export {
  type AutovalidateMode,
  type FieldConfig,
  type FormChange,
  type FormConfig,
  type NewFieldStateOpts,
  type SetValueOpts,
  type ValidateOpts,
} from "src/config";
export { f, FieldConfigBuilder, FormConfigBuilder } from "src/configBuilders";
export { type FieldState, newFieldState } from "src/fields/fieldState";
export { type FocusHandle, newFocusHandle } from "src/focusHandle";
export { createFormState, type FormState, type RegisteredField } from "src/formState";
export { required, type Rule, type RuleContext } from "src/rules";
export { useFieldState, useFormState, type UseFormStateOpts } from "src/useFormState";
