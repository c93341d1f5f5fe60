import { ValidationError } from "class-validator";

/**
 * Flatten class-validator errors into `path: message` lines.
 *
 * Nested errors are reported with their full property path, e.g.
 * `events.0.meta.href: href must be a URL address`.
 */
export function formatValidationErrors(
  errors: ValidationError[],
  parentPath = "",
): string[] {
  return errors.flatMap((error) => {
    const path = parentPath
      ? `${parentPath}.${error.property}`
      : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${path}: ${message}`,
    );
    return [...own, ...formatValidationErrors(error.children ?? [], path)];
  });
}
