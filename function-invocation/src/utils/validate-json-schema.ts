import { Ajv } from "ajv";

const ajv = new Ajv({ allErrors: true, strict: false });

type CompiledValidator = ReturnType<typeof ajv.compile>;

// Tool schemas are long-lived objects; compile each one once.
const compiled = new WeakMap<Record<string, unknown>, CompiledValidator>();

export function validateJsonSchema(
  data: unknown,
  schema: Record<string, unknown>,
): { valid: true } | { valid: false; errors: string } {
  let validate = compiled.get(schema);
  if (!validate) {
    try {
      validate = ajv.compile(schema);
    } catch (error: unknown) {
      // A malformed schema fails the value it was meant to check.
      const message = error instanceof Error ? error.message : String(error);
      return { valid: false, errors: message };
    }
    compiled.set(schema, validate);
  }
  const valid = validate(data);
  if (!valid) {
    return { valid: false, errors: ajv.errorsText(validate.errors) };
  }
  return { valid: true };
}
