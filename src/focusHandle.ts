import { makeAutoObservable } from "mobx";
import { fail } from "src/utils";

/**
 * The focus resource behind a field.
 *
 * A field either creates its own handle, in which case it owns it and disposes it along with itself,
 * or is given one by its caller, in which case it only borrows it and the caller stays responsible
 * for disposing it (i.e. when the same handle is shared with other consumers).
 */
export interface FocusHandle {
  readonly label: string | undefined;
  readonly hasFocus: boolean;
  readonly disposed: boolean;
  requestFocus(): void;
  unfocus(): void;
  /** Releases the handle; any further use throws. */
  dispose(): void;
}

class FocusHandleImpl implements FocusHandle {
  hasFocus = false;
  disposed = false;

  constructor(readonly label: string | undefined) {
    makeAutoObservable(this, { label: false }, { autoBind: true });
  }

  requestFocus(): void {
    this.assertNotDisposed();
    this.hasFocus = true;
  }

  unfocus(): void {
    this.assertNotDisposed();
    this.hasFocus = false;
  }

  dispose(): void {
    this.assertNotDisposed();
    this.hasFocus = false;
    this.disposed = true;
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      fail(`FocusHandle ${this.label ?? "(unlabeled)"} was used after being disposed`);
    }
  }
}

/** Creates a new, unfocused `FocusHandle`. */
export function newFocusHandle(label?: string): FocusHandle {
  return new FocusHandleImpl(label);
}
