import type { DevboxConfig } from "../types/config.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";

export type ConfigValidationResult =
  | { valid: true; config: DevboxConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a merged config document against `config.schema.json`. */
export async function validateConfig(config: unknown, registry?: SchemaRegistry): Promise<ConfigValidationResult> {
  const reg = registry ?? (await createRegistry());
  const validate = await reg.getValidator<DevboxConfig>("config");
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: await reg.errorsText(validate) };
}
