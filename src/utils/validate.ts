import { validate, ValidationError } from "class-validator";
import { plainToInstance } from "class-transformer";
import { ParseError } from "../errors/file-client-error";

/**
 * Converts a parsed response object into `DtoClass` and validates it.
 * Any constraint violation becomes a ParseError listing every message.
 */
export async function validateResponse<T extends object>(
  DtoClass: new () => T,
  plain: Record<string, unknown>,
): Promise<T> {
  const instance = plainToInstance(DtoClass, plain);
  const validationErrors: ValidationError[] = await validate(instance);

  const errors = validationErrors.flatMap((err) =>
    Object.values(err.constraints || {}),
  );

  if (errors.length > 0) {
    throw new ParseError(
      `Unexpected response from server: ${errors.join(", ")}`,
      errors,
    );
  }

  return instance;
}
