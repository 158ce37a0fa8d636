/**
 * Generic Result type for handling success/failure without exceptions.
 * Adapters and file-system helpers return it for expected failures.
 */
type ResultState<T, E> =
  | { readonly kind: 'ok'; readonly value: T }
  | { readonly kind: 'fail'; readonly error: E };

export class Result<T = void, E = Error> {
  private constructor(private readonly state: ResultState<T, E>) {}

  static ok<E = Error>(): Result<void, E>;
  static ok<T, E = Error>(value: T): Result<T, E>;
  static ok<T, E = Error>(value?: T): Result<T | undefined, E> {
    return new Result<T | undefined, E>({ kind: 'ok', value });
  }

  static fail<T = void, E = Error>(error: E): Result<T, E> {
    return new Result<T, E>({ kind: 'fail', error });
  }

  get isSuccess(): boolean {
    return this.state.kind === 'ok';
  }

  get isFailure(): boolean {
    return this.state.kind === 'fail';
  }

  getValue(): T {
    if (this.state.kind !== 'ok') {
      throw new Error('Cannot get value from failed result');
    }
    return this.state.value;
  }

  getError(): E {
    if (this.state.kind !== 'fail') {
      throw new Error('Cannot get error from successful result');
    }
    return this.state.error;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    if (this.state.kind === 'fail') {
      return Result.fail<U, E>(this.state.error);
    }
    return Result.ok<U, E>(fn(this.state.value));
  }
}
