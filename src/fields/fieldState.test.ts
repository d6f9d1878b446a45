import { reaction } from "mobx";
import { f } from "src/configBuilders";
import { newFieldState } from "src/fields/fieldState";
import { FocusHandle, newFocusHandle } from "src/focusHandle";
import { createFormState } from "src/formState";
import { Rule, required } from "src/rules";

describe("fieldState", () => {
  afterEach(() => jest.restoreAllMocks());

  it("keeps the last value set", () => {
    const field = newFieldState<string>({ name: "firstName" });
    ["a", "b", "c"].forEach((v) => field.setValue(v));
    expect(field.value).toBe("c");
  });

  it("prefers its own initial value over the form's", () => {
    const form = createFormState({ initialValue: { firstName: "form" } });
    const field = newFieldState<string>({ name: "firstName", initialValue: "local" }, form);
    expect(field.initialValue).toBe("local");
    expect(field.value).toBe("local");
  });

  it("falls back to the form's initial value", () => {
    const form = createFormState({ initialValue: { firstName: "form" } });
    const field = newFieldState<string>({ name: "firstName" }, form);
    expect(field.initialValue).toBe("form");
    expect(field.value).toBe("form");
  });

  it("has no initial value if neither it nor the form declares one", () => {
    const field = newFieldState<string>({ name: "firstName" }, createFormState());
    expect(field.initialValue).toBeUndefined();
    expect(field.value).toBeUndefined();
  });

  it("resolves its initial value only once", () => {
    const form = createFormState({ initialValue: { firstName: "a1" } });
    const field = newFieldState<string>({ name: "firstName" }, form);
    form.patchInitialValue({ firstName: "a2" });
    field.setValue("changed");
    field.reset();
    expect(field.value).toBe("a1");
  });

  it("marks touched the first time it gains focus", () => {
    const field = newFieldState<string>({ name: "firstName" });
    let transitions = 0;
    reaction(
      () => field.touched,
      () => transitions++,
    );
    expect(field.touched).toBe(false);
    // When the field is focused and blurred a few times
    for (let i = 0; i < 3; i++) {
      field.focusHandle.requestFocus();
      field.focusHandle.unfocus();
    }
    // Then touched only flipped once
    expect(field.touched).toBe(true);
    expect(transitions).toBe(1);
  });

  it("ignores losing focus for touched", () => {
    const field = newFieldState<string>({ name: "firstName" });
    field.onFocusChange(false);
    expect(field.touched).toBe(false);
  });

  it("stops at the first failing rule", () => {
    const second = jest.fn(() => "second");
    const field = newFieldState<string>({ name: "firstName", rules: [required, second] });
    expect(field.validate()).toBe(false);
    expect(field.errorText).toBe("Required");
    expect(second).not.toHaveBeenCalled();
  });

  it("passes the value and context to rules", () => {
    const rule: Rule<string | undefined> = jest.fn(() => undefined);
    const field = newFieldState<string>({ name: "firstName", initialValue: "a1", rules: [rule] });
    field.setValue("a2");
    expect(field.validate()).toBe(true);
    expect(rule).toHaveBeenCalledWith("a2", { name: "firstName", initialValue: "a1", form: undefined });
  });

  it("clears the rule error once the value is fixed and revalidated", () => {
    const field = newFieldState<string>({ name: "firstName", rules: [required] });
    field.validate();
    field.setValue("a1");
    // Not re-validated yet, b/c the user hasn't interacted with the field
    expect(field.errorText).toBe("Required");
    expect(field.isValid).toBe(true);
    expect(field.validate()).toBe(true);
    expect(field.errorText).toBeUndefined();
  });

  it("can be invalidated with a custom error", () => {
    const handle = newFakeFocusHandle();
    const field = newFieldState<string>({ name: "email", initialValue: "a@b.com", focusHandle: handle });
    field.invalidate("Email is taken");
    expect(field.hasError).toBe(true);
    expect(field.isValid).toBe(false);
    expect(field.errorText).toBe("Email is taken");
    expect(field.customError).toBe("Email is taken");
    expect(handle.requestFocus).toHaveBeenCalledTimes(1);
  });

  it("keeps the custom error when validating without clearing it", () => {
    const field = newFieldState<string>({ name: "email", initialValue: "a@b.com" });
    field.invalidate("Email is taken");
    expect(field.validate({ clearCustomError: false })).toBe(false);
    expect(field.errorText).toBe("Email is taken");
    expect(field.validate()).toBe(true);
    expect(field.errorText).toBeUndefined();
  });

  it("shows a rule error ahead of the custom error", () => {
    const field = newFieldState<string>({ name: "email", rules: [required] });
    field.invalidate("Email is taken");
    expect(field.errorText).toBe("Required");
    expect(field.customError).toBe("Email is taken");
  });

  it("does not request focus when validating", () => {
    const handle = newFakeFocusHandle();
    const field = newFieldState<string>({ name: "email", rules: [required], focusHandle: handle });
    field.validate();
    expect(handle.requestFocus).not.toHaveBeenCalled();
  });

  it("overlays the decoration error", () => {
    const field = newFieldState<string>({ name: "email", initialValue: "a@b.com", decorationError: "Bad" });
    expect(field.errorText).toBeUndefined();
    expect(field.effectiveError).toBe("Bad");
    expect(field.hasError).toBe(true);
    expect(field.validate()).toBe(false);
    // Our own error wins over the decoration's
    field.invalidate("Email is taken");
    expect(field.effectiveError).toBe("Email is taken");
    // And the decoration error survives validation
    field.validate();
    expect(field.effectiveError).toBe("Bad");
  });

  it("can reset", () => {
    const onReset = jest.fn();
    const field = newFieldState<string>({ name: "age", initialValue: "18", rules: [required], onReset });
    field.didChange("21");
    field.setValue("");
    field.invalidate("Too young");
    expect(field.touched).toBe(true);
    field.reset();
    expect(field.value).toBe("18");
    expect(field.customError).toBeUndefined();
    expect(field.errorText).toBeUndefined();
    expect(field.touched).toBe(false);
    expect(field.hasInteractedByUser).toBe(false);
    expect(onReset).toHaveBeenCalledTimes(1);
  });

  it("applies the transform only when collecting", () => {
    const field = newFieldState({ name: "age", initialValue: "18", transform: (v: string | undefined) => Number(v) });
    expect(field.transformedValue).toBe(18);
    expect(field.save()).toBe(18);
    expect(field.value).toBe("18");
  });

  it("calls onSaved with the untransformed value", () => {
    const onSaved = jest.fn();
    const field = newFieldState(f.field<string>("age").initial("18").transform(Number).onSaved(onSaved).build());
    expect(field.save()).toBe(18);
    expect(onSaved).toHaveBeenCalledWith("18");
  });

  it("calls onChanged for user changes only", () => {
    const onChanged = jest.fn();
    const field = newFieldState<string>({ name: "firstName", onChanged });
    field.setValue("a1");
    field.didChange("a2");
    expect(onChanged).toHaveBeenCalledTimes(1);
    expect(onChanged).toHaveBeenCalledWith("a2");
    expect(field.hasInteractedByUser).toBe(true);
  });

  it("knows when it is dirty", () => {
    const field = newFieldState<string>({ name: "firstName", initialValue: "a1" });
    expect(field.dirty).toBe(false);
    field.setValue("a2");
    expect(field.dirty).toBe(true);
    field.setValue("a1");
    expect(field.dirty).toBe(false);
  });

  it("compares dates by value for dirty", () => {
    const field = newFieldState<Date>({ name: "birthday", initialValue: new Date(2020, 0, 1) });
    field.setValue(new Date(2020, 0, 1));
    expect(field.dirty).toBe(false);
  });

  it("can tell what is required", () => {
    const firstName = newFieldState(f.field<string>("firstName").req().build());
    const nickname = newFieldState(f.field<string>("nickname").build());
    expect(firstName.required).toBe(true);
    expect(nickname.required).toBe(false);
  });

  describe("register", () => {
    it("can wait to register", () => {
      const warn = jest.spyOn(console, "warn");
      const form = createFormState();
      const field = newFieldState<string>({ name: "a", initialValue: "1" }, form, { register: false });
      expect(form.getField("a")).toBeUndefined();
      expect(form.instantValue).toEqual({});
      // Focus isn't tracked yet either
      field.focusHandle.requestFocus();
      field.focusHandle.unfocus();
      expect(field.touched).toBe(false);
      // When it registers, twice
      field.register();
      field.register();
      // Then it's in the form once
      expect(form.getField("a")).toBe(field);
      expect(form.instantValue).toEqual({ a: "1" });
      expect(warn).not.toHaveBeenCalled();
      field.focusHandle.requestFocus();
      expect(field.touched).toBe(true);
    });

    it("fails to register once disposed", () => {
      const field = newFieldState<string>({ name: "a" }, createFormState(), { register: false });
      field.dispose();
      expect(() => field.register()).toThrow("Field a was registered after being disposed");
    });

    it("leaves the form alone when disposed before registering", () => {
      const debug = jest.spyOn(console, "debug");
      const form = createFormState();
      const registered = newFieldState<string>({ name: "a" }, form);
      newFieldState<string>({ name: "a" }, form, { register: false }).dispose();
      expect(debug).not.toHaveBeenCalled();
      expect(form.getField("a")).toBe(registered);
    });
  });

  describe("once disposed", () => {
    it("keeps its released focus handle", () => {
      const field = newFieldState<string>({ name: "a" });
      const owned = field.focusHandle;
      field.dispose();
      field.setFocusHandle(undefined);
      expect(field.focusHandle).toBe(owned);
      field.setFocusHandle(newFocusHandle("borrowed"));
      expect(field.focusHandle).toBe(owned);
      expect(field.ownsFocusHandle).toBe(true);
    });

    it("records custom errors without requesting focus", () => {
      const handle = newFakeFocusHandle();
      const field = newFieldState<string>({ name: "a", focusHandle: handle });
      field.dispose();
      field.invalidate("Taken");
      expect(field.errorText).toBe("Taken");
      expect(handle.requestFocus).not.toHaveBeenCalled();
    });

    it("ignores requests for focus", () => {
      const field = newFieldState<string>({ name: "a" });
      field.dispose();
      expect(() => field.requestFocus()).not.toThrow();
      expect(field.focusHandle.hasFocus).toBe(false);
    });
  });

  describe("autovalidate", () => {
    it("validates after the user interacts by default", () => {
      const field = newFieldState<string>({ name: "firstName", rules: [required] });
      field.setValue("");
      expect(field.errorText).toBeUndefined();
      field.didChange("");
      expect(field.errorText).toBe("Required");
      field.setValue("a1");
      expect(field.errorText).toBeUndefined();
    });

    it("validates on every change when always", () => {
      const field = newFieldState<string>({ name: "firstName", rules: [required], autovalidateMode: "always" });
      expect(field.errorText).toBe("Required");
      field.setValue("a1");
      expect(field.errorText).toBeUndefined();
    });

    it("only validates explicitly when disabled", () => {
      const field = newFieldState<string>({ name: "firstName", rules: [required], autovalidateMode: "disabled" });
      field.didChange("");
      expect(field.errorText).toBeUndefined();
      expect(field.validate()).toBe(false);
      expect(field.errorText).toBe("Required");
    });

    it("skips disabled fields", () => {
      const field = newFieldState<string>({
        name: "firstName",
        rules: [required],
        autovalidateMode: "always",
        enabled: false,
      });
      field.setValue("");
      expect(field.errorText).toBeUndefined();
    });

    it("keeps the custom error", () => {
      const field = newFieldState<string>({ name: "email", autovalidateMode: "always" });
      field.invalidate("Email is taken");
      field.setValue("b@c.com");
      expect(field.errorText).toBe("Email is taken");
    });
  });

  describe("enabled", () => {
    it("is and-d with the form's", () => {
      const form = createFormState();
      const field = newFieldState<string>({ name: "firstName" }, form);
      expect(field.enabled).toBe(true);
      form.setEnabled(false);
      expect(field.enabled).toBe(false);
      form.setEnabled(true);
      field.setEnabled(false);
      expect(field.enabled).toBe(false);
    });
  });

  describe("focus handle", () => {
    it("disposes a handle it created", () => {
      const field = newFieldState<string>({ name: "firstName" });
      const handle = field.focusHandle;
      expect(field.ownsFocusHandle).toBe(true);
      expect(handle.label).toBe("firstName");
      field.dispose();
      expect(handle.disposed).toBe(true);
      expect(field.disposed).toBe(true);
    });

    it("does not dispose a borrowed handle", () => {
      const handle = newFocusHandle("shared");
      const field = newFieldState<string>({ name: "firstName", focusHandle: handle });
      expect(field.ownsFocusHandle).toBe(false);
      field.dispose();
      expect(handle.disposed).toBe(false);
      // And it's still usable by whoever else has it
      handle.requestFocus();
      expect(handle.hasFocus).toBe(true);
    });

    it("stops watching a borrowed handle after dispose", () => {
      const handle = newFocusHandle("shared");
      const field = newFieldState<string>({ name: "firstName", focusHandle: handle });
      field.dispose();
      handle.requestFocus();
      expect(field.touched).toBe(false);
    });

    it("can be disposed twice", () => {
      const field = newFieldState<string>({ name: "firstName" });
      field.dispose();
      expect(() => field.dispose()).not.toThrow();
    });

    it("releases an owned handle when given one to borrow", () => {
      const field = newFieldState<string>({ name: "firstName" });
      const owned = field.focusHandle;
      const borrowed = newFocusHandle("borrowed");
      field.setFocusHandle(borrowed);
      expect(owned.disposed).toBe(true);
      expect(field.focusHandle).toBe(borrowed);
      expect(field.ownsFocusHandle).toBe(false);
      // And touched now follows the new handle
      borrowed.requestFocus();
      expect(field.touched).toBe(true);
    });

    it("creates its own handle when a borrowed one is taken away", () => {
      const borrowed = newFocusHandle("borrowed");
      const field = newFieldState<string>({ name: "firstName", focusHandle: borrowed });
      field.setFocusHandle(undefined);
      expect(borrowed.disposed).toBe(false);
      expect(field.focusHandle).not.toBe(borrowed);
      expect(field.ownsFocusHandle).toBe(true);
    });

    it("keeps its own handle when there is nothing to borrow", () => {
      const field = newFieldState<string>({ name: "firstName" });
      const owned = field.focusHandle;
      field.setFocusHandle(undefined);
      expect(field.focusHandle).toBe(owned);
      expect(owned.disposed).toBe(false);
    });
  });
});

function newFakeFocusHandle(): FocusHandle & { requestFocus: jest.Mock } {
  return {
    label: "fake",
    hasFocus: false,
    disposed: false,
    requestFocus: jest.fn(),
    unfocus: jest.fn(),
    dispose: jest.fn(),
  };
}
