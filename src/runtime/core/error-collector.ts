import type { UserErrorValue } from './values.js';

/** Errors recorded instead of raised while `error_mode` is `:collect` */
export class ErrorCollector {
  private readonly errors: UserErrorValue[] = [];

  collect(error: UserErrorValue): void {
    this.errors.push(error);
  }

  getErrors(): readonly UserErrorValue[] {
    return [...this.errors];
  }

  clear(): void {
    this.errors.length = 0;
  }

  get size(): number {
    return this.errors.length;
  }
}
