import { invariant } from "@approxeq/core";

/** Single-owner mutable cell. Reads copy the current value out. */
export class Cell<T> {
  #value: T;

  constructor(value: T) {
    this.#value = value;
  }

  get(): T {
    return this.#value;
  }

  set(value: T): void {
    this.#value = value;
  }

  /** Store `value` and return the previous contents. */
  replace(value: T): T {
    const prev = this.#value;
    this.#value = value;
    return prev;
  }

  /** Apply `fn` to the current value, store and return the result. */
  update(fn: (value: T) => T): T {
    this.#value = fn(this.#value);
    return this.#value;
  }
}

/** Thrown when a shared borrow is requested while the cell is mutably borrowed. */
export class BorrowError extends Error {
  override name = "BorrowError";

  constructor(message = "RefCell: already mutably borrowed") {
    super(message);
  }
}

/** Thrown when an exclusive borrow is requested while any borrow is live. */
export class BorrowMutError extends Error {
  override name = "BorrowMutError";

  constructor(message = "RefCell: already borrowed") {
    super(message);
  }
}

export type BorrowState = "unused" | "reading" | "writing";

/** Shared (read-only) access to a {@link RefCell}'s contents. */
export interface RefGuard<T> {
  readonly value: T;
  readonly released: boolean;
  release(): void;
}

/** Exclusive (read-write) access to a {@link RefCell}'s contents. */
export interface RefMutGuard<T> {
  value: T;
  readonly released: boolean;
  release(): void;
}

class SharedBorrow<T> implements RefGuard<T> {
  readonly #read: () => T;
  #onRelease: (() => void) | undefined;

  constructor(read: () => T, onRelease: () => void) {
    this.#read = read;
    this.#onRelease = onRelease;
  }

  get released(): boolean {
    return this.#onRelease === undefined;
  }

  get value(): T {
    invariant(this.#onRelease !== undefined, "RefCell: shared borrow used after release");
    return this.#read();
  }

  release(): void {
    const onRelease = this.#onRelease;
    invariant(onRelease !== undefined, "RefCell: shared borrow released twice");
    this.#onRelease = undefined;
    onRelease();
  }
}

class ExclusiveBorrow<T> implements RefMutGuard<T> {
  readonly #read: () => T;
  readonly #write: (value: T) => void;
  #onRelease: (() => void) | undefined;

  constructor(read: () => T, write: (value: T) => void, onRelease: () => void) {
    this.#read = read;
    this.#write = write;
    this.#onRelease = onRelease;
  }

  get released(): boolean {
    return this.#onRelease === undefined;
  }

  get value(): T {
    invariant(this.#onRelease !== undefined, "RefCell: mutable borrow used after release");
    return this.#read();
  }

  set value(value: T) {
    invariant(this.#onRelease !== undefined, "RefCell: mutable borrow used after release");
    this.#write(value);
  }

  release(): void {
    const onRelease = this.#onRelease;
    invariant(onRelease !== undefined, "RefCell: mutable borrow released twice");
    this.#onRelease = undefined;
    onRelease();
  }
}

/**
 * Shared mutable cell with runtime-checked borrows.
 *
 * Any number of shared borrows may be live at once, or exactly one mutable
 * borrow. Conflicting requests throw ({@link BorrowError} /
 * {@link BorrowMutError}); the `try*` variants return `undefined` instead.
 * Guards must be released explicitly; prefer {@link RefCell.withBorrow} and
 * {@link RefCell.withBorrowMut}, which release in `finally`.
 */
export class RefCell<T> {
  #value: T;
  #readers = 0;
  #writing = false;

  constructor(value: T) {
    this.#value = value;
  }

  borrowState(): BorrowState {
    if (this.#writing) return "writing";
    return this.#readers > 0 ? "reading" : "unused";
  }

  tryBorrow(): RefGuard<T> | undefined {
    if (this.#writing) return undefined;

    this.#readers += 1;
    return new SharedBorrow(
      () => this.#value,
      () => {
        invariant(this.#readers > 0, "RefCell: shared borrow count underflow");
        this.#readers -= 1;
      },
    );
  }

  borrow(): RefGuard<T> {
    const guard = this.tryBorrow();
    if (guard === undefined) throw new BorrowError();
    return guard;
  }

  tryBorrowMut(): RefMutGuard<T> | undefined {
    if (this.#writing || this.#readers > 0) return undefined;

    this.#writing = true;
    return new ExclusiveBorrow(
      () => this.#value,
      (value) => {
        this.#value = value;
      },
      () => {
        invariant(this.#writing, "RefCell: mutable borrow released while not writing");
        this.#writing = false;
      },
    );
  }

  borrowMut(): RefMutGuard<T> {
    const guard = this.tryBorrowMut();
    if (guard === undefined) throw new BorrowMutError();
    return guard;
  }

  withBorrow<R>(fn: (value: T) => R): R {
    const guard = this.borrow();
    try {
      return fn(guard.value);
    } finally {
      guard.release();
    }
  }

  withBorrowMut<R>(fn: (guard: RefMutGuard<T>) => R): R {
    const guard = this.borrowMut();
    try {
      return fn(guard);
    } finally {
      guard.release();
    }
  }

  /** Store `value` and return the previous contents. Requires exclusive access. */
  replace(value: T): T {
    return this.withBorrowMut((guard) => {
      const prev = guard.value;
      guard.value = value;
      return prev;
    });
  }
}
