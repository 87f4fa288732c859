import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

/** A compiled schema. Narrows its input to `T` when it returns true. */
export type ValidateFn<T = unknown> = ((data: unknown) => data is T) & { errors?: unknown };

type Validator = {
  compile: <T = unknown>(schema: unknown) => ValidateFn<T>;
  errorsText: (errors: unknown) => string;
};

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

// draft 2020-12, all errors, date-time and uri formats
function newValidator(): Validator {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): Validator };
  const withFormats = addFormats as unknown as (ajv: Validator, formats: string[]) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  withFormats(ajv, ["date-time", "uri"]);
  return ajv;
}

/** Discovers and loads every `*.schema.json` in a directory. Validators are compiled on first use. */
export class SchemaRegistry {
  private schemas = new Map<string, unknown>();
  private readonly ajv: Validator = newValidator();

  constructor(private readonly schemaDir: string) {}

  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = (await fs.promises.readdir(this.schemaDir)).filter((f) => f.endsWith(".schema.json"));
    for (const file of files) {
      const schema: unknown = JSON.parse(await fs.promises.readFile(path.join(this.schemaDir, file), "utf8"));
      this.schemas.set(file.replace(/\.schema\.json$/, ""), schema);
    }
  }

  names(): string[] {
    return [...this.schemas.keys()].sort();
  }

  /** Ajv caches compiled schemas by object, so repeated calls compile once. */
  async getValidator<T = unknown>(name: string): Promise<ValidateFn<T>> {
    const schema = this.schemas.get(name);
    if (schema === undefined) {
      throw new Error(`Schema not found: ${name} (available: ${this.names().join(", ")})`);
    }
    return this.ajv.compile<T>(schema);
  }

  /** Error text from the most recent call of `validate`. */
  async errorsText(validate: ValidateFn): Promise<string> {
    return this.ajv.errorsText(validate.errors);
  }
}

export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? DEFAULT_SCHEMA_DIR);
  await registry.load();
  return registry;
}
