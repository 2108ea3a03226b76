/**
 * Compound resource identifiers
 *
 * The metadata API addresses records with keys such as
 * `patient-abc,device-123`: a principal component, optionally followed by a
 * component scoped under it. Bare ids (`123`) are only meaningful together
 * with a resource type.
 */

import { AmbiguousIdentifierError } from '../errors';

const SEPARATOR = ',';
const PREFIX_SEPARATOR = '-';

function stripPrefix(component: string): string {
  const index = component.indexOf(PREFIX_SEPARATOR);
  return index === -1 ? component : component.slice(index + 1);
}

export class ResourceId {
  private constructor(
    public readonly principal: string,
    public readonly relative?: string
  ) {}

  /**
   * Parse an absolute (`principal,relative`) key, or qualify a bare id with
   * a resource type hint (`123` + `patient` -> `patient-123`).
   */
  static parse(raw: string | ResourceId, hint?: string): ResourceId {
    if (raw instanceof ResourceId) {
      return raw;
    }

    const separatorIndex = raw.indexOf(SEPARATOR);
    if (separatorIndex !== -1) {
      return new ResourceId(
        raw.slice(0, separatorIndex),
        raw.slice(separatorIndex + 1)
      );
    }

    if (hint) {
      const principal = raw.includes(PREFIX_SEPARATOR)
        ? raw
        : `${hint}${PREFIX_SEPARATOR}${raw}`;
      return new ResourceId(principal);
    }

    throw new AmbiguousIdentifierError(raw);
  }

  static of(principal: string, relative?: string): ResourceId {
    return new ResourceId(principal, relative);
  }

  /**
   * The bare, user-facing id of the most specific component.
   */
  get unqualified(): string {
    if (
      this.relative !== undefined &&
      this.relative.includes(PREFIX_SEPARATOR)
    ) {
      return stripPrefix(this.relative);
    }
    return stripPrefix(this.principal);
  }

  asTuple(): readonly [string] | readonly [string, string] {
    return this.relative === undefined
      ? [this.principal]
      : [this.principal, this.relative];
  }

  equals(other: unknown): boolean {
    if (other instanceof ResourceId) {
      return (
        this.principal === other.principal && this.relative === other.relative
      );
    }
    if (typeof other === 'string') {
      return this.toString() === other;
    }
    return false;
  }

  /**
   * Substring probe over the key components. `,` asks whether the key is
   * compound; `-` is always present in a qualified key.
   */
  contains(substring: string): boolean {
    if (substring === SEPARATOR) {
      return this.relative !== undefined;
    }
    if (substring === PREFIX_SEPARATOR) {
      return true;
    }
    return (
      this.principal.includes(substring) ||
      (this.relative ?? '').includes(substring)
    );
  }

  toString(): string {
    return this.relative === undefined
      ? this.principal
      : `${this.principal}${SEPARATOR}${this.relative}`;
  }
}
