import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { Ajv2020 } from "ajv/dist/2020.js";
import type { ValidateFunction } from "ajv";
import { createLogger, type Logger } from "./logger.js";

/**
 * Capability the protocol core needs from a schema store: does `payload`
 * satisfy the schema registered under `schemaName`?
 */
export interface PayloadValidator {
  validate(schemaName: string, payload: unknown): boolean;
}

const SCHEMA_NAME = /^[A-Za-z][A-Za-z0-9]*$/;

// Source layout first, then the layout tsc produces under dist/.
const schemaDirCandidates = [
  new URL("../schemas/", import.meta.url),
  new URL("../../../../packages/protocol/schemas/", import.meta.url),
];

export function resolveSchemaDir(): string {
  for (const candidate of schemaDirCandidates) {
    const dir = fileURLToPath(candidate);
    if (existsSync(dir)) {
      return dir;
    }
  }
  return fileURLToPath(schemaDirCandidates[0]);
}

export interface JsonSchemaValidatorOptions {
  schemaDir?: string;
  logger?: Logger;
}

/**
 * Validates payloads against `<schemaDir>/<schemaName>.json` (JSON Schema
 * 2020-12). Schemas are compiled on first use. A missing schema fails closed.
 */
export class JsonSchemaValidator implements PayloadValidator {
  readonly schemaDir: string;
  private readonly ajv = new Ajv2020({ allErrors: true, strict: false });
  private readonly compiled = new Map<string, ValidateFunction | null>();
  private readonly logger: Logger;

  constructor(options: JsonSchemaValidatorOptions = {}) {
    this.schemaDir = options.schemaDir ?? resolveSchemaDir();
    this.logger = options.logger ?? createLogger("validator");
  }

  validate(schemaName: string, payload: unknown): boolean {
    const validateFn = this.load(schemaName);
    if (!validateFn) {
      return false;
    }

    if (validateFn(payload)) {
      this.logger.debug(`Validation successful: ${schemaName}`);
      return true;
    }

    this.logger.warn(
      `Validation error for ${schemaName}: ${this.ajv.errorsText(validateFn.errors)}`,
    );
    return false;
  }

  private load(schemaName: string): ValidateFunction | null {
    const cached = this.compiled.get(schemaName);
    if (cached !== undefined) {
      return cached;
    }

    if (!SCHEMA_NAME.test(schemaName)) {
      this.logger.error(`Refusing to load schema with invalid name ${JSON.stringify(schemaName)}`);
      return null;
    }

    const schemaPath = join(this.schemaDir, `${schemaName}.json`);
    let compiled: ValidateFunction | null = null;
    try {
      const schema: unknown = JSON.parse(readFileSync(schemaPath, "utf8"));
      if (typeof schema !== "object" || schema === null) {
        this.logger.error(`Schema file ${schemaPath} does not contain a JSON object`);
      } else {
        compiled = this.ajv.compile(schema);
      }
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.error(`Schema file not found: ${schemaPath}`);
      } else {
        this.logger.error(`Failed to load schema ${schemaPath}`, error);
      }
    }

    this.compiled.set(schemaName, compiled);
    return compiled;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
