/** Complex number with real and imaginary parts of the same type. */
export interface Complex<T> {
  readonly re: T;
  readonly im: T;
}

export function complex<T>(re: T, im: T): Complex<T> {
  return { re, im };
}
