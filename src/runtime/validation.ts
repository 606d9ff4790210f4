// ── Shape Checks ─────────────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === "string" && values.some((v) => v === value);
}

// ── Field Reader ─────────────────────────────────────────────────────────────

export interface NumberBounds {
  readonly min?: number;
  readonly max?: number;
  readonly integer?: boolean;
}

/**
 * Reads typed fields out of an untrusted object. Problems are collected into
 * `errors` instead of thrown, so one pass reports everything that is wrong.
 * Each reader returns undefined for a missing or invalid field.
 */
export class FieldReader {
  constructor(
    private readonly obj: Record<string, unknown>,
    private readonly path: string,
    readonly errors: string[],
  ) {}

  /** Reader for a nested object, or undefined (with an error) when it is not one. */
  static of(value: unknown, path: string, errors: string[]): FieldReader | undefined {
    if (!isRecord(value)) {
      errors.push(`"${path}" must be an object`);
      return undefined;
    }
    return new FieldReader(value, path, errors);
  }

  has(field: string): boolean {
    return this.obj[field] !== undefined && this.obj[field] !== null;
  }

  raw(field: string): unknown {
    return this.obj[field];
  }

  string(field: string): string | undefined {
    const value = this.obj[field];
    if (typeof value !== "string" || value.length === 0) {
      this.fail(field, "must be a non-empty string");
      return undefined;
    }
    return value;
  }

  optionalString(field: string): string | undefined {
    return this.has(field) ? this.string(field) : undefined;
  }

  number(field: string, bounds: NumberBounds = {}): number | undefined {
    const value = this.obj[field];
    if (typeof value !== "number" || !Number.isFinite(value)) {
      this.fail(field, "must be a number");
      return undefined;
    }
    if (bounds.integer && !Number.isInteger(value)) {
      this.fail(field, "must be an integer");
      return undefined;
    }
    if (bounds.min !== undefined && value < bounds.min) {
      this.fail(field, `must be >= ${bounds.min}`);
      return undefined;
    }
    if (bounds.max !== undefined && value > bounds.max) {
      this.fail(field, `must be <= ${bounds.max}`);
      return undefined;
    }
    return value;
  }

  boolean(field: string): boolean | undefined {
    const value = this.obj[field];
    if (typeof value !== "boolean") {
      this.fail(field, "must be a boolean");
      return undefined;
    }
    return value;
  }

  oneOf<T extends string>(field: string, values: readonly T[]): T | undefined {
    const value = this.obj[field];
    if (!isOneOf(values, value)) {
      this.fail(field, `must be one of: ${values.join(", ")}`);
      return undefined;
    }
    return value;
  }

  array(field: string): unknown[] | undefined {
    const value: unknown = this.obj[field];
    if (!Array.isArray(value)) {
      this.fail(field, "must be an array");
      return undefined;
    }
    return value;
  }

  stringArray(field: string): string[] | undefined {
    const items = this.array(field);
    if (!items) return undefined;
    const strings: string[] = [];
    items.forEach((item, index) => {
      if (typeof item === "string") {
        strings.push(item);
      } else {
        this.errors.push(`"${this.at(field)}[${index}]" must be a string`);
      }
    });
    return strings.length === items.length ? strings : undefined;
  }

  /** Dotted path of a field, for nested readers. */
  at(field: string): string {
    return this.path ? `${this.path}.${field}` : field;
  }

  private fail(field: string, problem: string): void {
    this.errors.push(`"${this.at(field)}" ${problem}`);
  }
}
