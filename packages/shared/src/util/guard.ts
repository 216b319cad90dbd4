import { ValidationError } from "../error/domain-error.js";

export const requireNonEmpty = (value: string, code: string, message: string): void => {
  if (!value || value.trim().length === 0) {
    throw new ValidationError(code, message);
  }
};
