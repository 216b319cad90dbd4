import { requireNonEmpty } from "@scriptorium/shared";

export class VersionId {
  private constructor(private readonly value: string) {}

  static create(value: string): VersionId {
    requireNonEmpty(value, "VERSION_ID_EMPTY", "VersionId is empty");
    return new VersionId(value);
  }

  static reconstruct(value: string): VersionId {
    return VersionId.create(value);
  }

  equals(other: VersionId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}

export const sameVersion = (a: VersionId | null, b: VersionId | null): boolean => {
  if (a === null || b === null) {
    return a === b;
  }
  return a.equals(b);
};
