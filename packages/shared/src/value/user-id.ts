import { requireNonEmpty } from "../util/guard.js";

export class UserId {
  private constructor(private readonly value: string) {}

  static create(value: string): UserId {
    requireNonEmpty(value, "USER_ID_EMPTY", "UserId is empty");
    return new UserId(value);
  }

  static reconstruct(value: string): UserId {
    return UserId.create(value);
  }

  equals(other: UserId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
