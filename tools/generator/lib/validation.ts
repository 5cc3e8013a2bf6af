import { Ajv, type ValidateFunction } from "ajv";
import addFormatsPlugin from "ajv-formats";
import { existsSync } from "fs";
import { readJsonFile } from "./json.js";
import { REPORT_SCHEMA_PATH } from "./paths.js";

const addFormats = addFormatsPlugin.default;

export interface ValidationIssue {
  file: string;
  messages: string[];
}

function createAjv(): Ajv {
  const ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true });
  addFormats(ajv);
  return ajv;
}

let cachedValidator: ValidateFunction | null = null;

export function getReportValidator(): ValidateFunction {
  if (!cachedValidator) {
    cachedValidator = createAjv().compile(readJsonFile<object>(REPORT_SCHEMA_PATH));
  }
  return cachedValidator;
}

export function validateReport(data: unknown): string[] {
  const validate = getReportValidator();
  if (validate(data)) {
    return [];
  }
  return (validate.errors ?? []).map((err) => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`);
}

export function validateReportFile(path: string): ValidationIssue[] {
  if (!existsSync(path)) {
    return [{ file: path, messages: [`${path} does not exist`] }];
  }

  let data: unknown;
  try {
    data = readJsonFile<unknown>(path);
  } catch (error) {
    return [
      {
        file: path,
        messages: [`not valid JSON: ${error instanceof Error ? error.message : String(error)}`],
      },
    ];
  }

  const messages = validateReport(data);
  return messages.length > 0 ? [{ file: path, messages }] : [];
}
